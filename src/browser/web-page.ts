/**
 * Web Page
 *
 * Local handle to a page living inside the engine. Every operation is one
 * awaited call through the owning registry; values pass through the codec.
 * Frame-scoped operations carry the handle's current frame path.
 */

import {
  booleanCodec,
  cookieCodec,
  cookieListCodec,
  encodeSettingsPatch,
  frameSetCodec,
  headerMapCodec,
  HeaderMap,
  jsonCodec,
  keyboardEventCodec,
  mouseEventCodec,
  nullableStringCodec,
  numberCodec,
  paperSizeCodec,
  positionCodec,
  rectCodec,
  renderOptionsCodec,
  settingsCodec,
  sizeCodec,
  stringCodec,
  voidCodec,
  type Codec,
  type Cookie,
  type FrameSetInfo,
  type HeadersInit,
  type KeyboardEvent,
  type MouseEvent,
  type PaperSize,
  type Position,
  type Rect,
  type RenderFormat,
  type RenderOptions,
  type Size,
  type WebPageSettings,
  type WireValue,
} from '../codec/index.js';
import { FrameNotFoundError, RemoteError } from '../shared/errors/index.js';
import { ENGINE_FRAME_NOT_FOUND, type ResultDecoder } from '../transport/index.js';
import { FrameContext, type FrameContextState } from './frame-context.js';
import type { PageRegistry } from './page-registry.js';

export class WebPage {
  private readonly frames = new FrameContext();

  /**
   * Handles are created by a PageRegistry; callers obtain them from
   * EngineProcess.createWebPage() or WebPage.pages().
   */
  constructor(private readonly registry: PageRegistry) {}

  /**
   * False once the page or its process has been closed
   */
  get isOpen(): boolean {
    return this.registry.isLive(this);
  }

  /**
   * Current frame navigation state
   */
  get frameContext(): FrameContextState {
    return this.frames.state;
  }

  // ==================== Lifecycle ====================

  /**
   * Release the page inside the engine. Child pages it opened stay open.
   */
  async close(): Promise<void> {
    await this.registry.close(this);
  }

  /**
   * Page that opened this one, when it is tracked and still open
   */
  parent(): WebPage | undefined {
    return this.registry.parentOf(this);
  }

  // ==================== Navigation ====================

  /**
   * Load a URL and wait for it to finish loading.
   *
   * @throws RemoteError when the engine reports a failed load
   */
  async open(url: string): Promise<void> {
    this.frames.reset();
    await this.call('open', [url], voidCodec);
  }

  async canGoBack(): Promise<boolean> {
    return this.get('canGoBack', booleanCodec);
  }

  async canGoForward(): Promise<boolean> {
    return this.get('canGoForward', booleanCodec);
  }

  async goBack(): Promise<void> {
    this.frames.reset();
    await this.call('goBack', [], voidCodec);
  }

  async goForward(): Promise<void> {
    this.frames.reset();
    await this.call('goForward', [], voidCodec);
  }

  /**
   * Move through session history by a relative offset
   */
  async go(index: number): Promise<void> {
    this.frames.reset();
    await this.call('go', [index], voidCodec);
  }

  async reload(): Promise<void> {
    this.frames.reset();
    await this.call('reload', [], voidCodec);
  }

  async stop(): Promise<void> {
    await this.call('stop', [], voidCodec);
  }

  // ==================== Content ====================

  async content(): Promise<string> {
    return this.get('content', nullableStringCodec);
  }

  async setContent(content: string): Promise<void> {
    this.frames.reset();
    await this.set('setContent', stringCodec, content);
  }

  /**
   * Replace the document, resolving relative references against `url`.
   */
  async setContentAndUrl(content: string, url: string): Promise<void> {
    this.frames.reset();
    await this.call('setContentAndUrl', [content, url], voidCodec);
  }

  async plainText(): Promise<string> {
    return this.get('plainText', nullableStringCodec);
  }

  async title(): Promise<string> {
    return this.get('title', nullableStringCodec);
  }

  async url(): Promise<string> {
    return this.get('url', nullableStringCodec);
  }

  async windowName(): Promise<string> {
    return this.get('windowName', nullableStringCodec);
  }

  // ==================== Geometry ====================

  /**
   * Area rendered by render(); the zero rect means the whole page
   */
  async clipRect(): Promise<Rect> {
    return this.get('clipRect', rectCodec);
  }

  async setClipRect(rect: Rect): Promise<void> {
    await this.set('setClipRect', rectCodec, rect);
  }

  async scrollPosition(): Promise<Position> {
    return this.get('scrollPosition', positionCodec);
  }

  async setScrollPosition(position: Position): Promise<void> {
    await this.set('setScrollPosition', positionCodec, position);
  }

  async viewportSize(): Promise<Size> {
    return this.get('viewportSize', sizeCodec);
  }

  async setViewportSize(size: Size): Promise<void> {
    await this.set('setViewportSize', sizeCodec, size);
  }

  async zoomFactor(): Promise<number> {
    return this.get('zoomFactor', numberCodec);
  }

  async setZoomFactor(factor: number): Promise<void> {
    await this.set('setZoomFactor', numberCodec, factor);
  }

  /**
   * Paper layout used when rendering to PDF
   */
  async paperSize(): Promise<PaperSize> {
    return this.get('paperSize', paperSizeCodec);
  }

  async setPaperSize(size: PaperSize): Promise<void> {
    await this.set('setPaperSize', paperSizeCodec, size);
  }

  // ==================== Cookies & Headers ====================

  async cookies(): Promise<Cookie[]> {
    return this.get('cookies', cookieListCodec);
  }

  /**
   * Replace every cookie visible to the page.
   */
  async setCookies(cookies: Cookie[]): Promise<void> {
    await this.set('setCookies', cookieListCodec, cookies);
  }

  /**
   * @returns false when the engine refused the cookie
   */
  async addCookie(cookie: Cookie): Promise<boolean> {
    return this.call('addCookie', [cookieCodec.encode(cookie)], booleanCodec);
  }

  /**
   * @returns false when no cookie had that name
   */
  async deleteCookie(name: string): Promise<boolean> {
    return this.call('deleteCookie', [name], booleanCodec);
  }

  async clearCookies(): Promise<void> {
    await this.call('clearCookies', [], voidCodec);
  }

  async customHeaders(): Promise<HeaderMap> {
    return this.get('customHeaders', headerMapCodec);
  }

  /**
   * Replace the headers sent with every request. Previously set headers
   * are dropped, not merged.
   */
  async setCustomHeaders(headers: HeadersInit): Promise<void> {
    await this.set('setCustomHeaders', headerMapCodec, new HeaderMap(headers));
  }

  // ==================== Engine State ====================

  /**
   * Directory injectJs() resolves relative paths against
   */
  async libraryPath(): Promise<string> {
    return this.get('libraryPath', stringCodec);
  }

  async setLibraryPath(path: string): Promise<void> {
    await this.set('setLibraryPath', stringCodec, path);
  }

  async navigationLocked(): Promise<boolean> {
    return this.get('navigationLocked', booleanCodec);
  }

  async setNavigationLocked(locked: boolean): Promise<void> {
    await this.set('setNavigationLocked', booleanCodec, locked);
  }

  async offlineStoragePath(): Promise<string> {
    return this.get('offlineStoragePath', nullableStringCodec);
  }

  /**
   * Offline storage quota in bytes
   */
  async offlineStorageQuota(): Promise<number> {
    return this.get('offlineStorageQuota', numberCodec);
  }

  async settings(): Promise<WebPageSettings> {
    return this.get('settings', settingsCodec);
  }

  /**
   * Update the given settings; omitted keys keep their current values.
   */
  async setSettings(settings: Partial<WebPageSettings>): Promise<void> {
    await this.call('setSettings', [encodeSettingsPatch(settings)], voidCodec);
  }

  // ==================== Child Pages ====================

  async ownsPages(): Promise<boolean> {
    return this.get('ownsPages', booleanCodec);
  }

  /**
   * Track windows this page opens (links with a target, window.open) as children.
   */
  async setOwnsPages(owns: boolean): Promise<void> {
    await this.set('setOwnsPages', booleanCodec, owns);
  }

  /**
   * Live child pages, in creation order
   */
  async pages(): Promise<WebPage[]> {
    return this.registry.childPages(this);
  }

  /**
   * Window names of named child pages, in creation order
   */
  async pageWindowNames(): Promise<string[]> {
    return this.registry.childWindowNames(this);
  }

  // ==================== Scripts ====================

  /**
   * Evaluate a function source in the current frame and return its JSON result.
   *
   * @example
   * ```typescript
   * const title = await page.evaluateJavaScript('function() { return document.title; }');
   * ```
   */
  async evaluateJavaScript(script: string): Promise<unknown> {
    return this.frameCall('evaluateJavaScript', [script], jsonCodec);
  }

  /**
   * Schedule a function source to run after `delayMs` without waiting for it.
   */
  async evaluateAsync(script: string, delayMs = 0): Promise<void> {
    await this.call('evaluateAsync', [script, delayMs], voidCodec);
  }

  /**
   * Load a remote script into the page and wait for it to run.
   */
  async includeJs(url: string): Promise<void> {
    await this.call('includeJs', [url], voidCodec);
  }

  /**
   * Inject a local script file; relative paths resolve against libraryPath().
   *
   * @returns false when the file could not be read
   */
  async injectJs(path: string): Promise<boolean> {
    return this.call('injectJs', [path], booleanCodec);
  }

  // ==================== Output ====================

  /**
   * Render the page to a file on the engine's filesystem.
   */
  async render(path: string, options: RenderOptions = {}): Promise<void> {
    await this.call('render', [path, renderOptionsCodec.encode(options)], voidCodec);
  }

  /**
   * Render the page and return the image as base64.
   */
  async renderBase64(format: RenderFormat = 'png'): Promise<string> {
    return this.call('renderBase64', [format], stringCodec);
  }

  // ==================== Input ====================

  async sendMouseEvent(event: MouseEvent): Promise<void> {
    await this.call('sendMouseEvent', [mouseEventCodec.encode(event)], voidCodec);
  }

  async sendKeyboardEvent(event: KeyboardEvent): Promise<void> {
    await this.call('sendKeyboardEvent', [keyboardEventCodec.encode(event)], voidCodec);
  }

  /**
   * Attach files to the file input matching `selector`.
   */
  async uploadFile(selector: string, paths: string | string[]): Promise<void> {
    await this.call('uploadFile', [selector, Array.isArray(paths) ? paths : [paths]], voidCodec);
  }

  // ==================== Frames ====================

  /**
   * Number of frames in the top-level frameset
   */
  async frameCount(): Promise<number> {
    return this.get('frameCount', numberCodec);
  }

  /**
   * Names of the frames in the top-level frameset, in document order
   */
  async frameNames(): Promise<string[]> {
    return (await this.get('frameSet', frameSetCodec)).names;
  }

  /**
   * Name of the frame holding input focus, regardless of the frame context
   */
  async focusedFrameName(): Promise<string> {
    return this.get('focusedFrameName', nullableStringCodec);
  }

  async frameName(): Promise<string> {
    return this.frameCall('frameName', [], nullableStringCodec);
  }

  async frameUrl(): Promise<string> {
    return this.frameCall('frameUrl', [], nullableStringCodec);
  }

  async frameTitle(): Promise<string> {
    return this.frameCall('frameTitle', [], nullableStringCodec);
  }

  async frameContent(): Promise<string> {
    return this.frameCall('frameContent', [], nullableStringCodec);
  }

  async setFrameContent(content: string): Promise<void> {
    await this.frameCall('setFrameContent', [content], voidCodec);
  }

  async framePlainText(): Promise<string> {
    return this.frameCall('framePlainText', [], nullableStringCodec);
  }

  /**
   * Enter a child frame of the current frame by name.
   *
   * @throws FrameNotFoundError when no child has that name; the context is unchanged
   */
  async switchToFrameName(name: string): Promise<void> {
    this.frames.enterByName(name, await this.childFrames(name));
  }

  /**
   * Enter a child frame of the current frame by zero-based position.
   *
   * @throws FrameNotFoundError when the position is out of range; the context is unchanged
   */
  async switchToFramePosition(position: number): Promise<void> {
    this.frames.enterByPosition(position, await this.childFrames(position));
  }

  /**
   * Return to the top-level document.
   */
  switchToMainFrame(): void {
    this.registry.assertLive(this, 'switchToMainFrame');
    this.frames.reset();
  }

  /**
   * Return to the parent of the current frame. No-op at the top level.
   */
  switchToParentFrame(): void {
    this.registry.assertLive(this, 'switchToParentFrame');
    this.frames.leave();
  }

  /**
   * Enter the top-level frame that currently holds input focus.
   *
   * @throws FrameNotFoundError when no frame holds focus
   */
  async switchToFocusedFrame(): Promise<void> {
    const focused = await this.focusedFrameName();
    if (!focused) {
      throw new FrameNotFoundError('<focused>');
    }
    const topLevel = await this.get('frameSet', frameSetCodec);
    if (!topLevel.names.includes(focused)) {
      throw new FrameNotFoundError(focused, [...topLevel.names]);
    }
    this.frames.reset();
    this.frames.enterByName(focused, topLevel);
  }

  // ==================== Internals ====================

  /**
   * Frameset of the current frame. A stored path the engine can no longer
   * resolve, e.g. after script navigation, surfaces as FrameNotFoundError.
   */
  private async childFrames(selector: string | number): Promise<FrameSetInfo> {
    try {
      return await this.frameCall('frameSet', [], frameSetCodec);
    } catch (error) {
      if (error instanceof RemoteError && error.remoteMessage === ENGINE_FRAME_NOT_FOUND) {
        throw new FrameNotFoundError(selector);
      }
      throw error;
    }
  }

  private async get<T>(member: string, decoder: ResultDecoder<T>): Promise<T> {
    return this.registry.invoke(this, { member }, decoder);
  }

  private async set<T>(member: string, codec: Codec<T>, value: T): Promise<void> {
    await this.registry.invoke(this, { member, args: [codec.encode(value)] }, voidCodec);
  }

  private async call<T>(member: string, args: WireValue[], decoder: ResultDecoder<T>): Promise<T> {
    return this.registry.invoke(this, { member, args }, decoder);
  }

  private async frameCall<T>(
    member: string,
    args: WireValue[],
    decoder: ResultDecoder<T>
  ): Promise<T> {
    return this.registry.invoke(this, { member, args, frame: this.frames.selectors() }, decoder);
  }
}
