export { CloudClient, type CloudClientOptions } from './cloudClient.js';
export { createCloudClient } from './clientFactory.js';
export { resolveConfig, type ServiceConfig, type LogLevel } from './config.js';
export { RemoteDirectoryLister, LIST_PAGE_SIZE } from './directoryLister.js';
export { ENDPOINTS } from './endpoints.js';
export {
  AuthenticationFailedError,
  AuthRequiredError,
  CloudError,
  InvalidArgumentError,
  isCloudError,
  NotFoundError,
  RemoteError,
  TransportError,
  type CloudErrorCode,
} from './errors.js';
export { md5Hex, passwordDigest, sha256Hex } from './hashing.js';
export { HttpTransport } from './httpTransport.js';
export { ItemNormalizer, toItemRef, type ItemInput, type ItemRef } from './itemNormalizer.js';
export { createLogger } from './logger.js';
export { parsePath, PathResolver, type ParsedPath } from './pathResolver.js';
export { Session } from './session.js';
export { TokenStore } from './tokenStore.js';
export {
  ROOT_DIRECTORY,
  ROOT_ID,
  type ApiTransport,
  type DirectoryEntry,
  type DirectoryLister,
  type Entry,
  type EntryId,
  type FileEntry,
} from './types.js';
export { readPackageVersion } from './version.js';
