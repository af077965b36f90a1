/**
 * WebPage Unit Tests
 *
 * Exercises every page operation against the in-process fake engine.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PageRegistry, type WebPage } from '../../../src/browser/index.js';
import { isZeroRect, type Cookie } from '../../../src/codec/index.js';
import { FrameNotFoundError, RemoteError } from '../../../src/shared/errors/index.js';
import { HttpTransport } from '../../../src/transport/index.js';
import { FakeEngine } from '../../helpers/fake-engine.js';

const FRAMESET_SITE = {
  title: 'Frames',
  focused: 'right',
  frames: [
    {
      name: 'left',
      url: 'http://frames.test/left',
      title: 'Left',
      content: '<p>left side</p>',
      frames: [{ name: 'inner', title: 'Inner' }],
    },
    { name: 'right', url: 'http://frames.test/right', title: 'Right' },
  ],
};

describe('WebPage', () => {
  let engine: FakeEngine;
  let transport: HttpTransport;
  let registry: PageRegistry;
  let page: WebPage;

  beforeEach(async () => {
    engine = new FakeEngine({
      sites: {
        'http://a.test/': {
          content: '<html><head><title>A</title></head><body>Alpha</body></html>',
        },
        'http://b.test/': { title: 'B' },
        'http://frames.test/': FRAMESET_SITE,
      },
    });
    await engine.listen();
    transport = new HttpTransport({ baseUrl: engine.url });
    registry = new PageRegistry(transport);
    page = await registry.createWebPage();
  });

  afterEach(async () => {
    transport.close();
    await engine.close();
  });

  function lastInvocation() {
    return engine.invocations().at(-1);
  }

  describe('navigation', () => {
    it('should load a page and report its title and url', async () => {
      await page.open('http://a.test/');

      await expect(page.title()).resolves.toBe('A');
      await expect(page.url()).resolves.toBe('http://a.test/');
      await expect(page.plainText()).resolves.toBe('AAlpha');
    });

    it('should raise RemoteError when the load fails', async () => {
      const error = await page.open('http://missing.test/').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RemoteError);
      if (error instanceof RemoteError) {
        expect(error.remoteMessage).toBe('failed to open http://missing.test/');
      }
      expect(page.isOpen).toBe(true);
    });

    it('should move through history', async () => {
      await page.open('http://a.test/');
      await page.open('http://b.test/');

      await expect(page.canGoBack()).resolves.toBe(true);
      await expect(page.canGoForward()).resolves.toBe(false);

      await page.goBack();
      await expect(page.url()).resolves.toBe('http://a.test/');
      await expect(page.canGoForward()).resolves.toBe(true);

      await page.goForward();
      await expect(page.url()).resolves.toBe('http://b.test/');

      await page.go(-1);
      await expect(page.url()).resolves.toBe('http://a.test/');

      await page.reload();
      await expect(page.title()).resolves.toBe('A');
      await page.stop();
      expect(lastInvocation()?.member).toBe('stop');
    });
  });

  describe('content', () => {
    it('should replace the document', async () => {
      await page.setContent('<html><head><title>T</title></head><body><b>x</b></body></html>');

      await expect(page.title()).resolves.toBe('T');
      await expect(page.plainText()).resolves.toBe('Tx');
      await expect(page.content()).resolves.toBe(
        '<html><head><title>T</title></head><body><b>x</b></body></html>'
      );
    });

    it('should replace the document with a base url', async () => {
      await page.setContentAndUrl('<p>hi</p>', 'http://base.test/');

      await expect(page.url()).resolves.toBe('http://base.test/');
      expect(lastInvocation()?.args).toEqual(['<p>hi</p>', 'http://base.test/']);
    });

    it('should report an empty window name for a top-level page', async () => {
      await expect(page.windowName()).resolves.toBe('');
    });
  });

  describe('geometry', () => {
    it('should start with an unset clip rect and round-trip a new one', async () => {
      expect(isZeroRect(await page.clipRect())).toBe(true);

      await page.setClipRect({ top: 1, left: 2, width: 300, height: 200 });
      await expect(page.clipRect()).resolves.toEqual({ top: 1, left: 2, width: 300, height: 200 });
    });

    it('should get and set scroll position, viewport and zoom', async () => {
      await expect(page.viewportSize()).resolves.toEqual({ width: 400, height: 300 });

      await page.setScrollPosition({ top: 50, left: 10 });
      await page.setViewportSize({ width: 1280, height: 720 });
      await page.setZoomFactor(0.5);

      await expect(page.scrollPosition()).resolves.toEqual({ top: 50, left: 10 });
      await expect(page.viewportSize()).resolves.toEqual({ width: 1280, height: 720 });
      await expect(page.zoomFactor()).resolves.toBe(0.5);
    });

    it('should keep a paper format without adding a margin', async () => {
      await expect(page.paperSize()).resolves.toEqual({});

      await page.setPaperSize({ format: 'A4', orientation: 'landscape' });

      const size = await page.paperSize();
      expect(size).toEqual({ format: 'A4', orientation: 'landscape' });
      expect(size.margin).toBeUndefined();
    });
  });

  describe('cookies', () => {
    const cookie: Cookie = {
      name: 'session',
      value: 'test-secret',
      domain: '.a.test',
      path: '/',
      expires: new Date(Date.UTC(2030, 0, 1)),
      secure: true,
      httpOnly: true,
    };

    it('should add a cookie and expose its formatted expiry', async () => {
      await expect(page.addCookie(cookie)).resolves.toBe(true);

      const [stored] = await page.cookies();
      expect(stored).toEqual({ ...cookie, rawExpires: 'Tue, 01 Jan 2030 00:00:00 GMT' });
    });

    it('should refuse a cookie without a name', async () => {
      await expect(page.addCookie({ ...cookie, name: '' })).resolves.toBe(false);
      await expect(page.cookies()).resolves.toEqual([]);
    });

    it('should delete, replace and clear cookies', async () => {
      await page.addCookie(cookie);
      await expect(page.deleteCookie('session')).resolves.toBe(true);
      await expect(page.deleteCookie('session')).resolves.toBe(false);

      await page.setCookies([
        { ...cookie, name: 'a', expires: undefined },
        { ...cookie, name: 'b', expires: undefined },
      ]);
      const names = (await page.cookies()).map((c) => c.name);
      expect(names).toEqual(['a', 'b']);

      await page.clearCookies();
      await expect(page.cookies()).resolves.toEqual([]);
    });
  });

  describe('custom headers', () => {
    it('should replace rather than merge', async () => {
      await page.setCustomHeaders({ 'X-First': '1' });
      await page.setCustomHeaders({ 'X-Second': ['2', '3'] });

      const headers = await page.customHeaders();
      expect(headers.has('x-first')).toBe(false);
      expect(headers.get('x-second')).toBe('2, 3');
      expect(headers.names()).toEqual(['X-Second']);
    });
  });

  describe('engine state', () => {
    it('should expose library and storage paths', async () => {
      await expect(page.libraryPath()).resolves.toBe('/tmp/fake-engine');
      await page.setLibraryPath('/tmp/scripts');
      await expect(page.libraryPath()).resolves.toBe('/tmp/scripts');

      await expect(page.offlineStoragePath()).resolves.toBe('/tmp/fake-engine/storage');
      await expect(page.offlineStorageQuota()).resolves.toBe(5242880);
    });

    it('should toggle the navigation lock', async () => {
      await expect(page.navigationLocked()).resolves.toBe(false);
      await page.setNavigationLocked(true);
      await expect(page.navigationLocked()).resolves.toBe(true);
    });

    it('should patch only the given settings', async () => {
      await page.setSettings({ userAgent: 'agent/2', xssAuditingEnabled: true });

      expect(lastInvocation()?.args).toEqual([{ userAgent: 'agent/2', XSSAuditingEnabled: true }]);
      await expect(page.settings()).resolves.toEqual({
        javascriptEnabled: true,
        loadImages: true,
        localToRemoteUrlAccessEnabled: false,
        userAgent: 'agent/2',
        userName: '',
        password: '',
        xssAuditingEnabled: true,
        webSecurityEnabled: true,
        resourceTimeout: 0,
      });
    });
  });

  describe('scripts and output', () => {
    it('should evaluate in the top-level document by default', async () => {
      await expect(page.evaluateJavaScript('function() { return 1; }')).resolves.toEqual({
        frame: '',
        script: 'function() { return 1; }',
      });
    });

    it('should forward async evaluation, includes and injections', async () => {
      await page.evaluateAsync('function() {}', 50);
      await page.includeJs('http://cdn.test/lib.js');

      await expect(page.injectJs('helpers.js')).resolves.toBe(true);
      await expect(page.injectJs('notes.txt')).resolves.toBe(false);
      expect(engine.page('1')?.events).toEqual([
        { member: 'evaluateAsync', args: ['function() {}', 50] },
        { member: 'includeJs', args: ['http://cdn.test/lib.js'] },
        { member: 'injectJs', args: ['helpers.js'] },
        { member: 'injectJs', args: ['notes.txt'] },
      ]);
    });

    it('should default the async delay to zero', async () => {
      await page.evaluateAsync('function() {}');
      expect(lastInvocation()?.args).toEqual(['function() {}', 0]);
    });

    it('should render to a file and to base64', async () => {
      await page.open('http://a.test/');
      await page.render('/tmp/out.jpg', { format: 'jpeg', quality: 90 });

      expect(lastInvocation()?.args).toEqual(['/tmp/out.jpg', { format: 'jpeg', quality: 90 }]);
      await expect(page.renderBase64('jpeg')).resolves.toBe(
        Buffer.from('jpeg:http://a.test/').toString('base64')
      );
      await expect(page.renderBase64()).resolves.toBe(
        Buffer.from('png:http://a.test/').toString('base64')
      );
    });
  });

  describe('input', () => {
    it('should forward mouse, keyboard and upload events', async () => {
      await page.sendMouseEvent({ type: 'click', x: 5, y: 6 });
      await page.sendKeyboardEvent({ type: 'keypress', key: 'a', modifiers: ['ctrl'] });
      await page.uploadFile('#file', '/tmp/upload.txt');

      expect(engine.page('1')?.events).toEqual([
        { member: 'sendMouseEvent', args: [{ type: 'click', x: 5, y: 6, button: 'left' }] },
        { member: 'sendKeyboardEvent', args: [{ type: 'keypress', key: 'a', modifier: 0x04000000 }] },
        { member: 'uploadFile', args: ['#file', ['/tmp/upload.txt']] },
      ]);
    });
  });

  describe('frames', () => {
    beforeEach(async () => {
      await page.open('http://frames.test/');
    });

    it('should report the top-level frameset', async () => {
      await expect(page.frameCount()).resolves.toBe(2);
      await expect(page.frameNames()).resolves.toEqual(['left', 'right']);
      expect(page.frameContext).toEqual({ kind: 'top' });
    });

    it('should scope frame accessors to the selected frame', async () => {
      await page.switchToFrameName('left');

      await expect(page.frameName()).resolves.toBe('left');
      await expect(page.frameTitle()).resolves.toBe('Left');
      await expect(page.frameUrl()).resolves.toBe('http://frames.test/left');
      await expect(page.frameContent()).resolves.toBe('<p>left side</p>');
      await expect(page.framePlainText()).resolves.toBe('left side');
      expect(lastInvocation()?.frame).toEqual([{ name: 'left' }]);
    });

    it('should descend by position and climb back', async () => {
      await page.switchToFrameName('left');
      await page.switchToFramePosition(0);

      await expect(page.frameName()).resolves.toBe('inner');
      expect(page.frameContext).toEqual({
        kind: 'frame',
        path: [{ name: 'left' }, { position: 0 }],
      });

      // Top-level queries ignore the selected frame
      await expect(page.frameCount()).resolves.toBe(2);

      page.switchToParentFrame();
      await expect(page.frameName()).resolves.toBe('left');

      page.switchToMainFrame();
      await expect(page.frameName()).resolves.toBe('');
    });

    it('should keep the context when a switch fails', async () => {
      await page.switchToFrameName('left');

      await expect(page.switchToFrameName('right')).rejects.toBeInstanceOf(FrameNotFoundError);
      await expect(page.switchToFramePosition(3)).rejects.toMatchObject({
        code: 'FRAME_NOT_FOUND',
      });
      expect(page.frameContext).toEqual({ kind: 'frame', path: [{ name: 'left' }] });
    });

    it('should report a frame path the engine no longer resolves as FrameNotFoundError', async () => {
      await page.switchToFrameName('left');
      // Script navigation replaced the frameset behind the handle's back
      const remote = engine.page('1');
      if (remote) {
        remote.root.frames = [];
      }

      const error = await page.switchToFramePosition(0).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FrameNotFoundError);
      expect(error).toMatchObject({ message: 'No frame at position 0 in the current frameset' });
      expect(page.frameContext).toEqual({ kind: 'frame', path: [{ name: 'left' }] });
    });

    it('should report the focused frame regardless of context', async () => {
      await page.switchToFrameName('left');
      await expect(page.focusedFrameName()).resolves.toBe('right');
    });

    it('should switch to the focused frame', async () => {
      await page.switchToFrameName('left');
      await page.switchToFocusedFrame();

      expect(page.frameContext).toEqual({ kind: 'frame', path: [{ name: 'right' }] });
      await expect(page.frameTitle()).resolves.toBe('Right');
    });

    it('should fail to switch to the focused frame when none has focus', async () => {
      await page.open('http://b.test/');
      await expect(page.switchToFocusedFrame()).rejects.toBeInstanceOf(FrameNotFoundError);
      expect(page.frameContext).toEqual({ kind: 'top' });
    });

    it('should change only the selected frame content', async () => {
      await page.switchToFrameName('right');
      await page.setFrameContent('<p>replaced</p>');

      await expect(page.frameContent()).resolves.toBe('<p>replaced</p>');
      page.switchToMainFrame();
      await page.switchToFrameName('left');
      await expect(page.frameContent()).resolves.toBe('<p>left side</p>');
    });

    it('should evaluate scripts in the selected frame', async () => {
      await page.switchToFrameName('right');
      await expect(page.evaluateJavaScript('function() {}')).resolves.toEqual({
        frame: 'right',
        script: 'function() {}',
      });
    });

    it('should return to the top level on navigation', async () => {
      await page.switchToFrameName('left');
      await page.open('http://frames.test/');
      expect(page.frameContext).toEqual({ kind: 'top' });

      await page.switchToFrameName('right');
      await page.setContent('<p>flat</p>');
      expect(page.frameContext).toEqual({ kind: 'top' });
    });

    it('should keep frame contexts separate per handle', async () => {
      const other = await registry.createWebPage();
      await other.open('http://frames.test/');

      await page.switchToFrameName('left');
      await other.switchToFrameName('right');

      await expect(page.frameName()).resolves.toBe('left');
      await expect(other.frameName()).resolves.toBe('right');
    });
  });
});
