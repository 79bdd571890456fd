export { tagForCapture, type CaptureTag } from './capture-tags.js';
export { spansToHtml, toSegments, escapeHtml, type Segment } from './html-renderer.js';
