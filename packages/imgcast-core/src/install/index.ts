export { ImageInstaller } from './image-installer.js';
export type { TypedImageInstallerEmitter } from './image-installer.js';
export { resolveCachePaths, archiveFileNameFromUrl } from './cache-paths.js';
export type {
  ImageDescriptor,
  CachePaths,
  InstallStage,
  StageEvent,
  InstallOutcome,
  InstallOptions,
  ImageInstallerDeps,
  ImageInstallerEvents,
} from './types.js';
