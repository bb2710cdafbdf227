/**
 * @docroom/collab-server - Real-time collaboration rooms over WebSocket
 *
 * Clients editing the same file share one Yjs document per room. The room
 * is loaded from the file, saved back after edits settle, and overwritten
 * when the file changes on disk.
 *
 * @example
 * ```typescript
 * import {
 *   createCollaborationServer,
 *   createFileContentsManager,
 *   createFileUpdateStores,
 *   createLogger,
 *   createMemoryFileIdManager,
 * } from '@docroom/collab-server';
 *
 * const contents = createFileContentsManager({ rootDir: './notes' });
 * const server = createCollaborationServer({
 *   contentsManager: contents,
 *   fileIdManager: createMemoryFileIdManager(contents),
 *   createUpdateStore: createFileUpdateStores('./notes', createLogger()),
 *   validateAuth: async (token) => token === 'test-secret',
 * });
 *
 * server.coordinator.events$.subscribe((event) => {
 *   console.log(event.action, event.path, event.msg);
 * });
 *
 * await server.start();
 * ```
 *
 * @example CLI
 * ```bash
 * docroom-collab --root ./notes --token test-secret
 * docroom-collab --no-auth --cleanup-delay off --debug
 * ```
 */

// Types
export type {
  AuthInfo,
  CollaborationEvent,
  CollaborationServerConfig,
  CollaborationStats,
  LogLevel,
  ResolvedCollaborationConfig,
} from './types.js';
export { DEFAULT_COLLABORATION_CONFIG } from './types.js';

// Ambient
export { CollabError, type CollabErrorCode, type CollabErrorOptions } from './errors.js';
export { createLogger, silentLogger, type Logger, type LoggerOptions } from './logger.js';
export { collaborationConfigSchema, configFromEnv, parseDelay, resolveConfig, type EnvConfig } from './config.js';

// Server
export {
  CollaborationServer,
  createCollaborationServer,
  createMemoryUpdateStores,
  matchRoute,
  readToken,
  type CollaborationServerOptions,
  type Route,
} from './collaboration-server.js';
export {
  handleSessionRequest,
  type DocumentSession,
  type SessionRequest,
  type SessionResponse,
} from './http/session-handler.js';
export { SessionIssuer } from './session.js';

// Rooms
export { RoomCoordinator, type RoomCoordinatorOptions, type UpdateStoreFactory } from './room-coordinator.js';
export { decodeRoomId, encodeRoomId, isDocumentRoomId, updateLogPath, type DocumentRoomId } from './room-id.js';
export { YRoom, type RoomClient, type RoomKind, type YRoomOptions } from './rooms/y-room.js';
export {
  DocumentRoom,
  type DocumentRoomOptions,
  type DocumentRoomPhase,
  type RoomEventSink,
} from './rooms/document-room.js';
export { TransientRoom } from './rooms/transient-room.js';
export { RoomRegistry } from './rooms/room-registry.js';

// Transport
export {
  CloseCode,
  YDocConnection,
  type ConnectionTransport,
  type YDocConnectionOptions,
} from './transport/ydoc-connection.js';
export { MessageQueue } from './transport/message-queue.js';
export {
  encodeAwareness,
  encodeSyncStep1,
  encodeSyncUpdate,
  MessageType,
  readAwarenessChanges,
  readUserName,
  type AwarenessChanges,
} from './protocol.js';

// Files
export { FileLoader, type FileLoaderCallback, type FileLoaderOptions } from './loaders/file-loader.js';
export { FileLoaderRegistry, type FileLoaderRegistryConfig } from './loaders/file-loader-registry.js';

// Contents
export {
  splitPath,
  type ContentFormat,
  type ContentModel,
  type ContentsManager,
  type ContentType,
  type FileIdManager,
  type GetContentOptions,
  type SaveContentModel,
} from './contents/contents-manager.js';
export {
  createFileContentsManager,
  FileContentsManager,
  type FileContentsManagerOptions,
} from './contents/file-contents-manager.js';
export { createMemoryContentsManager, MemoryContentsManager } from './contents/memory-contents-manager.js';
export { createMemoryFileIdManager, MemoryFileIdManager } from './contents/memory-file-id-manager.js';

// Documents
export {
  createYDocument,
  isSupportedDocumentType,
  parseNotebook,
  YDocument,
  YFile,
  YNotebook,
  type NotebookCell,
  type NotebookContent,
} from './documents/index.js';

// Update logs
export {
  applyStoredUpdates,
  writeDocumentState,
  type StoredUpdate,
  type UpdateStore,
} from './ystore/update-store.js';
export { createFileUpdateStores, FileUpdateStore, type FileUpdateStoreOptions } from './ystore/file-update-store.js';
export { MemoryUpdateStore } from './ystore/memory-update-store.js';
