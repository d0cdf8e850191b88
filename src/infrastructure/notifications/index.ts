export { EmailNotifications } from './EmailNotifications';
export type { EmailNotificationsOptions, MailTransport } from './EmailNotifications';
