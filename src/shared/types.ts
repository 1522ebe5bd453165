/**
 * Shared types for holdtalk
 */

// =============================================================================
// Sessions & Tracks
// =============================================================================

/**
 * The two independent hotkey tracks.
 */
export type SessionKind = 'dictation' | 'assistant';

export const SESSION_KINDS: readonly SessionKind[] = ['dictation', 'assistant'] as const;

/**
 * Per-track state machine. `idle` is the only rest state.
 */
export type TrackState =
  | 'idle'        // Armed, waiting for key-down
  | 'capturing'   // Microphone open (bounded by maxCaptureSeconds)
  | 'processing'; // Transcription + dispatch in flight (bounded by processingTimeoutSeconds)

/**
 * Read-only view of one track, handed to presentation consumers.
 */
export interface TrackSnapshot {
  kind: SessionKind;
  state: TrackState;
  sessionId: string | null;
  /** Wall-clock start of the current session (epoch ms) */
  startedAt: number | null;
  /** Wall-clock time the current state was entered (epoch ms) */
  stateEnteredAt: number;
}

// =============================================================================
// Audio
// =============================================================================

/**
 * One contiguous capture, mono or interleaved multi-channel Float32 PCM.
 */
export interface AudioBuffer {
  samples: Float32Array;
  sampleRate: number;
  channels: number;
  durationMs: number;
}

// =============================================================================
// Persisted entities
// =============================================================================

export interface Note {
  id: number;
  title: string;
  text: string;
  category: string;
  createdAt: number;
}

export interface ListItem {
  id: number;
  listId: number;
  text: string;
  done: boolean;
  position: number;
}

export interface List {
  id: number;
  name: string;
  category: string;
  createdAt: number;
}

export interface ListWithItems extends List {
  items: ListItem[];
}

export interface Appointment {
  id: number;
  title: string;
  description: string;
  /** Absolute instant (epoch ms, UTC) */
  startAt: number;
  remindLeadMinutes: number;
  notified: boolean;
  createdAt: number;
}

export interface Reminder {
  id: number;
  text: string;
  /** Absolute instant (epoch ms, UTC) */
  fireAt: number;
  notified: boolean;
  createdAt: number;
}

/**
 * A notifiable entity claimed by a scheduler sweep.
 */
export type DueNotification =
  | { type: 'reminder'; reminder: Reminder }
  | { type: 'appointment'; appointment: Appointment };

// =============================================================================
// Status surfaced to the user (overlay / tray / toast consumers)
// =============================================================================

export type StatusTone = 'info' | 'success' | 'warning' | 'error';

/**
 * Which view of the notes window an assistant query asked for.
 */
export type AgendaView = 'notes' | 'agenda' | 'reminders';

/**
 * Data read by an assistant query, for whichever view asked for it.
 */
export type AgendaSnapshot =
  | { view: 'notes'; notes: Note[]; lists: ListWithItems[] }
  | { view: 'agenda'; appointments: Appointment[] }
  | { view: 'reminders'; reminders: Reminder[] };

export interface UserStatus {
  kind: SessionKind | 'system';
  tone: StatusTone;
  message: string;
  /** Set when an assistant query wants the notes window opened on a tab */
  agenda?: AgendaSnapshot;
  timestamp: number;
}

// =============================================================================
// Settings
// =============================================================================

export type RecordingMode = 'hold' | 'toggle';

export type Language = 'en' | 'it';
