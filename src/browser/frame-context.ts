/**
 * Frame Context
 *
 * Per-handle frame navigation state. The state is a path of selectors from the
 * top-level document; the empty path is the top-level state. Frame-scoped calls
 * carry the path so the engine resolves the same frame on every request.
 */

import type { FrameSelector, FrameSetInfo } from '../codec/index.js';
import { FrameNotFoundError } from '../shared/errors/index.js';

export type FrameContextState =
  | { readonly kind: 'top' }
  | { readonly kind: 'frame'; readonly path: readonly FrameSelector[] };

export class FrameContext {
  private path: FrameSelector[] = [];

  get state(): FrameContextState {
    return this.path.length === 0 ? { kind: 'top' } : { kind: 'frame', path: [...this.path] };
  }

  get isTopLevel(): boolean {
    return this.path.length === 0;
  }

  /**
   * Number of frames between the top-level document and the current frame
   */
  get depth(): number {
    return this.path.length;
  }

  /**
   * Path sent with frame-scoped requests
   */
  selectors(): readonly FrameSelector[] {
    return [...this.path];
  }

  /**
   * Enter a direct child by name.
   *
   * @throws FrameNotFoundError when the name is not a child; state is unchanged
   */
  enterByName(name: string, children: FrameSetInfo): void {
    if (!children.names.includes(name)) {
      throw new FrameNotFoundError(name, [...children.names]);
    }
    this.path.push({ name });
  }

  /**
   * Enter a direct child by zero-based position.
   *
   * @throws FrameNotFoundError when the position is out of range; state is unchanged
   */
  enterByPosition(position: number, children: FrameSetInfo): void {
    if (!Number.isInteger(position) || position < 0 || position >= children.count) {
      throw new FrameNotFoundError(position, [...children.names]);
    }
    this.path.push({ position });
  }

  /**
   * Return to the parent frame. No-op at the top level.
   */
  leave(): void {
    this.path.pop();
  }

  /**
   * Return to the top-level document.
   */
  reset(): void {
    this.path = [];
  }
}
