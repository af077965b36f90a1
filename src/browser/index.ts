/**
 * Browser Module
 *
 * Page handles and the registry that owns them.
 */

export { PageRegistry, type PageInfo } from './page-registry.js';
export { WebPage } from './web-page.js';
export { FrameContext, type FrameContextState } from './frame-context.js';
