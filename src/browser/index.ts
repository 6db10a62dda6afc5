export { BrowserManager, BrowserUnavailableError, detectChromePath, DEFAULT_USER_AGENT } from './BrowserManager.js';
export type { BrowserOptions, PageOptions } from './BrowserManager.js';
export { DebugCapture } from './DebugCapture.js';
export type { DebugCaptureOptions, ScreenshotTarget } from './DebugCapture.js';
