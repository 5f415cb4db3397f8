/**
 * Campaign Ledger - Notifications Module Export
 */

export { NotificationLog, NotificationListener } from './notification-log';
export {
  AmountStringSchema,
  JsonValue,
  toJsonSafe,
  encodeNotificationPayload,
  decodeNotification,
} from './notification.codec';
