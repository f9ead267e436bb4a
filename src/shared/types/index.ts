/**
 * Shared types — single source of truth for every service and the gateway.
 */

// Clipboard history
export type {
  EntryKind,
  ImageFormat,
  ClipboardPayload,
  ClipboardEntry,
  HistoryChangeReason,
  HistoryChange,
} from './clipboard';
export { ENTRY_KINDS, isEntryKind } from './clipboard';

// Protocol
export type { ProtocolEntry, GatewayMessage, GatewayCommand } from './protocol';

// Errors
export { ClipringError, ErrorCode, TRANSIENT_CLIPBOARD_CODES } from './errors';
export type { ErrorSeverity } from './errors';
