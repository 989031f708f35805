/**
 * Core module.
 * Element resolution, download watching, archiving and the session
 * state machine. Talks to the browser only through the page port.
 */

export {
  resolveChain,
  scanByText,
  locateTarget,
  activateTarget,
  captureLabel,
} from './resolver.js';
export type {
  AttemptOutcome,
  ResolveAttempt,
  ResolveResult,
  ResolveOptions,
  TargetContext,
  TargetResult,
} from './resolver.js';
export { captureDiagnostics } from './diagnostics.js';
export type { DiagnosticCapture, CaptureOptions } from './diagnostics.js';
export { watchDownloads, matchDownload } from './downloads.js';
export type { DownloadWatch, DownloadResult, DownloadPredicate, WaitOptions } from './downloads.js';
export {
  archive,
  archiveFileName,
  extractHostIdentifier,
  moveFile,
  ArchiveError,
} from './archiver.js';
export type { ArtifactKind } from './archiver.js';
export { authenticate, navigate } from './login.js';
export type { Credentials, LoginContext, LoginResult } from './login.js';
export { performAction } from './actions.js';
export type { ActionContext } from './actions.js';
export {
  SessionController,
  StateTransitionError,
  AuthenticationError,
  selectActions,
} from './session.js';
export type { SessionDependencies } from './session.js';
export { normalizeTargetUrl, consoleBaseUrl, deepLinkUrl } from './urls.js';
