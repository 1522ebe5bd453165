/**
 * Notifications Module
 */

export { DesktopNotifier, desktopNotifier, type Notifier } from './Notifier.js';
export {
  NotificationScheduler,
  createNotificationScheduler,
  toastFor,
  type NotificationSchedulerDeps,
  type Toast,
} from './NotificationScheduler.js';
