export {
  allocations,
  GetAllocations,
  GetAllocationsHandler,
  rebuildAllocationsView,
} from './GetAllocations';
