/**
 * Types for the collaboration room server
 */

/**
 * Log level
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Result of a successful authentication
 */
export interface AuthInfo {
  userId: string;
  [key: string]: unknown;
}

/**
 * Server configuration
 */
export interface CollaborationServerConfig {
  /** Port to listen on */
  port?: number;
  /** Host to bind to */
  host?: string;
  /** Prefix of the session and room routes */
  basePath?: string;
  /** Seconds before an idle document room is destroyed (null: never) */
  documentCleanupDelay?: number | null;
  /** Debounce window in seconds before edits are written back (null: never save) */
  documentSaveDelay?: number | null;
  /** Seconds between two checks of a file for external changes (null: no watcher) */
  filePollInterval?: number | null;
  /** Max frame size in bytes */
  maxMessageSize?: number;
  /** Reject HTTP requests and upgrades without a valid token */
  requireAuth?: boolean;
  /** Auth validation function */
  validateAuth?: (token: string) => Promise<boolean | AuthInfo>;
  /** Enable logging */
  logging?: boolean | LogLevel;
}

/**
 * Fully resolved configuration
 */
export type ResolvedCollaborationConfig = Required<Omit<CollaborationServerConfig, 'validateAuth'>> & {
  validateAuth?: CollaborationServerConfig['validateAuth'];
};

/**
 * Default server configuration
 */
export const DEFAULT_COLLABORATION_CONFIG: Required<Omit<CollaborationServerConfig, 'validateAuth'>> = {
  port: 8888,
  host: '0.0.0.0',
  basePath: '/api/collaboration',
  documentCleanupDelay: 60,
  documentSaveDelay: 1,
  filePollInterval: 1,
  maxMessageSize: 1024 * 1024 * 1024, // 1GiB
  requireAuth: true,
  logging: 'info',
};

/**
 * Observability event emitted by the room coordinator
 */
export interface CollaborationEvent {
  /** Severity */
  level: LogLevel;
  /** Room identity */
  room: string;
  /** Path of the backing file, when the room is a document room */
  path: string | null;
  /** What happened (initialize, load, save, overwrite, clean) */
  action?: string;
  /** Human readable description */
  msg?: string;
  /** Epoch timestamp of the event */
  timestamp: number;
}

/**
 * Counters exposed by the stats endpoint
 */
export interface CollaborationStats {
  rooms: string[];
  loaders: number;
  connectedUsers: Record<string, string>;
  messagesReceived: number;
  sessionId: string;
}
