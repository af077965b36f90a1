/**
 * Page Registry
 *
 * Arena of remote page identifiers for one engine process.
 * Maps each identifier to its local WebPage handle plus parent and
 * creation-order metadata. Identifiers never leave this module.
 */

import { childPageListCodec, voidCodec, type ChildPageRef } from '../codec/index.js';
import { InvalidHandleError, RegistryError, TransportError } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';
import type { InvokeRequest, ResultDecoder, Transport } from '../transport/index.js';
import { WebPage } from './web-page.js';

const logger = createLogger('PageRegistry');

/**
 * Registry bookkeeping for one remote page
 */
interface PageRecord {
  id: string;
  page: WebPage;
  /** Remote id of the page whose action opened this one */
  parentId?: string;
  /** Declared window name; empty when opened without a target */
  windowName: string;
  /** Creation order within this registry */
  seq: number;
  createdAt: Date;
  closed: boolean;
}

/**
 * Snapshot of a registered page, for inspection and logging
 */
export interface PageInfo {
  page: WebPage;
  parent?: WebPage;
  windowName: string;
  createdAt: Date;
}

export class PageRegistry {
  private readonly records = new Map<string, PageRecord>();
  private readonly recordsByPage = new WeakMap<WebPage, PageRecord>();
  private readonly closedIds = new Set<string>();
  private nextSeq = 0;
  private invalidated = false;

  constructor(private readonly transport: Transport) {}

  /**
   * False once the owning process has closed
   */
  get isValid(): boolean {
    return !this.invalidated && !this.transport.isClosed;
  }

  /**
   * Number of live pages, children included
   */
  get size(): number {
    return this.records.size;
  }

  /**
   * Allocate a page inside the engine and return its handle.
   *
   * @throws RegistryError if the owning process is not open
   */
  async createWebPage(): Promise<WebPage> {
    if (!this.isValid) {
      throw RegistryError.processNotOpen('closed');
    }

    let id: string;
    try {
      id = await this.transport.createPage();
    } catch (error) {
      // A fault during creation means the process went away underneath us.
      if (error instanceof TransportError && this.invalidated) {
        throw RegistryError.processNotOpen('closed');
      }
      throw error;
    }

    const record = this.register(id, undefined, '');
    logger.debug('Page created', { seq: record.seq });
    return record.page;
  }

  /**
   * Invoke a member on the remote page behind a handle.
   *
   * @throws InvalidHandleError if the page or its process is closed
   */
  async invoke<T>(
    page: WebPage,
    request: Omit<InvokeRequest, 'target'>,
    decoder: ResultDecoder<T>
  ): Promise<T> {
    const record = this.liveRecord(page, request.member);
    return this.transport.call({ ...request, target: record.id }, decoder);
  }

  /**
   * Release the remote page. Tracked children stay open.
   *
   * @throws InvalidHandleError if the page or its process is already closed
   */
  async close(page: WebPage): Promise<void> {
    const record = this.liveRecord(page, 'close');
    await this.transport.call({ target: record.id, member: 'close' }, voidCodec);
    this.forget(record);
    logger.debug('Page closed', { seq: record.seq });
  }

  /**
   * Live child pages of a handle, in creation order.
   * The same remote page always maps to the same handle.
   */
  async childPages(page: WebPage): Promise<WebPage[]> {
    const refs = await this.childRefs(page);
    return refs.map((ref) => ref.page);
  }

  /**
   * Declared window names of live child pages, in creation order.
   * Windows opened without a target name are left out.
   */
  async childWindowNames(page: WebPage): Promise<string[]> {
    const refs = await this.childRefs(page);
    return refs.map((ref) => ref.windowName).filter((name) => name !== '');
  }

  /**
   * Whether the handle refers to a live page of this registry
   */
  isLive(page: WebPage): boolean {
    const record = this.recordsByPage.get(page);
    return this.isValid && record !== undefined && !record.closed;
  }

  /**
   * @throws InvalidHandleError if the page or its process is closed
   */
  assertLive(page: WebPage, operation: string): void {
    this.liveRecord(page, operation);
  }

  has(page: WebPage): boolean {
    return this.recordsByPage.has(page);
  }

  /**
   * Handle of the page that opened this one, if it is tracked
   */
  parentOf(page: WebPage): WebPage | undefined {
    const parentId = this.recordsByPage.get(page)?.parentId;
    return parentId === undefined ? undefined : this.records.get(parentId)?.page;
  }

  /**
   * Live pages in creation order
   */
  list(): PageInfo[] {
    return Array.from(this.records.values())
      .sort((a, b) => a.seq - b.seq)
      .map((record) => ({
        page: record.page,
        parent: record.parentId === undefined ? undefined : this.records.get(record.parentId)?.page,
        windowName: record.windowName,
        createdAt: record.createdAt,
      }));
  }

  /**
   * Invalidate every handle. Called by the process when it closes or faults.
   */
  invalidate(): void {
    if (this.invalidated) {
      return;
    }
    this.invalidated = true;
    for (const record of this.records.values()) {
      record.closed = true;
    }
    logger.debug('Registry invalidated', { pages: this.records.size });
    this.records.clear();
  }

  private register(id: string, parentId: string | undefined, windowName: string): PageRecord {
    const page = new WebPage(this);
    const record: PageRecord = {
      id,
      page,
      parentId,
      windowName,
      seq: this.nextSeq++,
      createdAt: new Date(),
      closed: false,
    };
    this.records.set(id, record);
    this.recordsByPage.set(page, record);
    return record;
  }

  private forget(record: PageRecord): void {
    record.closed = true;
    this.records.delete(record.id);
    this.closedIds.add(record.id);
  }

  private liveRecord(page: WebPage, operation: string): PageRecord {
    if (!this.isValid) {
      throw InvalidHandleError.processClosed(operation);
    }
    const record = this.recordsByPage.get(page);
    if (!record || record.closed) {
      throw InvalidHandleError.pageClosed(operation);
    }
    return record;
  }

  private async childRefs(page: WebPage): Promise<{ page: WebPage; windowName: string }[]> {
    const parent = this.liveRecord(page, 'pages');
    const refs: ChildPageRef[] = await this.transport.call(
      { target: parent.id, member: 'pages' },
      childPageListCodec
    );

    const children: { page: WebPage; windowName: string }[] = [];
    for (const ref of refs) {
      if (this.closedIds.has(ref.id)) {
        continue;
      }
      let record = this.records.get(ref.id);
      if (!record) {
        record = this.register(ref.id, parent.id, ref.windowName);
        logger.debug('Child page tracked', { parentSeq: parent.seq, seq: record.seq });
      } else if (ref.windowName) {
        record.windowName = ref.windowName;
      }
      children.push({ page: record.page, windowName: record.windowName });
    }
    return children;
  }
}
