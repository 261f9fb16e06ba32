export { DocumentState } from "./documentState.mjs";
export type { DocumentSnapshot, EditEvent } from "./documentState.mjs";
export { ConnectionRegistry } from "./connectionRegistry.mjs";
export type { Session, SessionChannel } from "./connectionRegistry.mjs";
export { FileTextStore } from "./persistentStore.mjs";
export type { FileTextStoreOptions, TextStore } from "./persistentStore.mjs";
export { SyncHub, createSyncHub } from "./syncHub.mjs";
export type { BroadcastReport, HubStatus, SyncHubOptions } from "./syncHub.mjs";
export {
  TextSyncError,
  MalformedMessageError,
  StoreUnavailableError,
  SessionUnreachableError,
  OversizedContentError
} from "./errors.mjs";
export type { TextSyncErrorCode } from "./errors.mjs";
export { silentLogger } from "./logger.mjs";
export type { Logger } from "./logger.mjs";
export * from "./protocol.mjs";
