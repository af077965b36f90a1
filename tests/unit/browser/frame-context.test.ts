/**
 * FrameContext Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { FrameContext } from '../../../src/browser/frame-context.js';
import { FrameNotFoundError } from '../../../src/shared/errors/index.js';

const CHILDREN = { names: ['left', 'right'], count: 2 };

describe('FrameContext', () => {
  it('should start at the top level', () => {
    const context = new FrameContext();
    expect(context.state).toEqual({ kind: 'top' });
    expect(context.isTopLevel).toBe(true);
    expect(context.selectors()).toEqual([]);
  });

  it('should record named and positional steps', () => {
    const context = new FrameContext();
    context.enterByName('right', CHILDREN);
    context.enterByPosition(0, { names: ['inner'], count: 1 });

    expect(context.depth).toBe(2);
    expect(context.state).toEqual({ kind: 'frame', path: [{ name: 'right' }, { position: 0 }] });
  });

  it('should leave the state unchanged when the name is missing', () => {
    const context = new FrameContext();
    context.enterByName('left', CHILDREN);

    expect(() => context.enterByName('missing', { names: [], count: 0 })).toThrow(
      FrameNotFoundError
    );
    expect(context.selectors()).toEqual([{ name: 'left' }]);
  });

  it.each([2, -1, 0.5])('should reject position %s', (position) => {
    const context = new FrameContext();
    expect(() => context.enterByPosition(position, CHILDREN)).toThrow(
      `No frame at position ${position} in the current frameset`
    );
    expect(context.isTopLevel).toBe(true);
  });

  it('should list the available names on failure', () => {
    const context = new FrameContext();
    try {
      context.enterByName('center', CHILDREN);
      expect.unreachable('enterByName should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(FrameNotFoundError);
      if (error instanceof FrameNotFoundError) {
        expect(error.message).toBe('No frame named "center" in the current frameset');
        expect(error.context).toEqual({ selector: 'center', available: ['left', 'right'] });
      }
    }
  });

  it('should pop one level on leave and ignore leave at the top', () => {
    const context = new FrameContext();
    context.leave();
    expect(context.isTopLevel).toBe(true);

    context.enterByName('left', CHILDREN);
    context.enterByPosition(1, CHILDREN);
    context.leave();
    expect(context.selectors()).toEqual([{ name: 'left' }]);
  });

  it('should return copies that do not alias internal state', () => {
    const context = new FrameContext();
    context.enterByName('left', CHILDREN);
    const before = context.state;
    context.reset();

    expect(before).toEqual({ kind: 'frame', path: [{ name: 'left' }] });
    expect(context.state).toEqual({ kind: 'top' });
  });
});
