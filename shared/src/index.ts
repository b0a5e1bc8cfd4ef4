/**
 * @fingerpaint/shared
 *
 * Platform-agnostic multi-touch drawing core shared by every host.
 */

// Types
export * from './types';

// Configuration
export {
  DEFAULT_STROKE_STYLE,
  StrokeStyleError,
  createStrokeStyle,
  isDebugRequested,
} from './config';

// Stroke state management
export * from './canvas';

// Rendering
export * from './renderer';

// Services
export * from './services';

// React hooks
export * from './hooks';

// Coordinate mapping
export { isDegenerateSize, toPixel } from './utils/coordinates';

// Debug logging
export {
  clearLogBuffer,
  createLogger,
  debug,
  disableDebug,
  enableDebug,
  getLogBuffer,
  isDebugEnabled,
} from './utils/debugLog';
