/**
 * @fileoverview Unit tests for the capability registry
 */

import { DependencyRegistry, DependencyResolutionError } from '../../../src';

interface TestDeps {
  uow: string;
  notifications: string;
  publish: string;
}

describe('DependencyRegistry', () => {
  describe('Resolution', () => {
    it('should hand out exactly the requested entries', () => {
      const registry = new DependencyRegistry<TestDeps>({
        uow: 'uow',
        notifications: 'mailer',
        publish: 'redis',
      });

      const resolved = registry.resolve(['notifications'], 'sendOutOfStockNotification');

      expect(resolved).toEqual({ notifications: 'mailer' });
      expect(Object.keys(resolved)).toEqual(['notifications']);
    });

    it('should resolve an empty declaration to an empty object', () => {
      const registry = new DependencyRegistry<TestDeps>({ uow: 'uow', notifications: 'mailer', publish: 'redis' });

      expect(registry.resolve([], 'noop')).toEqual({});
    });

    it('should not be affected by later changes to the source object', () => {
      const entries: TestDeps = { uow: 'uow', notifications: 'mailer', publish: 'redis' };
      const registry = new DependencyRegistry(entries);

      entries.publish = 'other';

      expect(registry.get('publish')).toBe('redis');
    });
  });

  describe('Unregistered Dependency Detection', () => {
    it('should name the handler and the missing dependency', () => {
      const registry = new DependencyRegistry<Partial<TestDeps>>({ uow: 'uow' });

      expect(() => registry.resolve(['notifications'], 'sendOutOfStockNotification')).toThrow(
        "Handler 'sendOutOfStockNotification' requires unregistered dependency 'notifications'. Registered: uow",
      );
    });

    it('should attach the dependency graph', () => {
      const registry = new DependencyRegistry<Partial<TestDeps>>({ uow: 'uow' });

      let caught: unknown;
      try {
        registry.resolve(['uow', 'publish'], 'publishAllocatedEvent');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(DependencyResolutionError);
      expect(caught instanceof DependencyResolutionError && caught.dependencyGraph).toBe(
        'publishAllocatedEvent\n├─ uow (OK)\n└─ publish (UNREGISTERED)',
      );
    });

    it('should treat an undefined entry as unregistered', () => {
      const registry = new DependencyRegistry<Partial<TestDeps>>({ uow: 'uow', publish: undefined });

      expect(registry.has('publish')).toBe(false);
      expect(() => registry.get('publish')).toThrow(DependencyResolutionError);
    });
  });
});
