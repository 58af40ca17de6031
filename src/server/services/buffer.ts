import type { CursorDirection, ErrorInfo } from '../../shared/types.js';
import { EngineError, errorInfo } from '../errors.js';

export type BufferDeleteResult = { ok: true; removed: string } | { ok: false; error: ErrorInfo };

/**
 * Committed text as a list of segments (one per commit) with an edit cursor
 * between segments.
 */
export class CommitBuffer {
  private items: string[];
  private position: number;
  private finalized = false;

  constructor(initialText = '') {
    this.items = [...initialText];
    this.position = this.items.length;
  }

  get text(): string {
    return this.items.join('');
  }

  get segments(): readonly string[] {
    return this.items;
  }

  get cursor(): number {
    return this.position;
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  /**
   * Text immediately before the cursor, or '' at the start.
   */
  get lastSegment(): string {
    return this.position > 0 ? this.items[this.position - 1] : '';
  }

  commit(text: string): void {
    this.assertOpen();
    if (text === '') return;
    this.items.splice(this.position, 0, text);
    this.position++;
  }

  deleteBack(): BufferDeleteResult {
    this.assertOpen();
    if (this.position === 0) {
      return { ok: false, error: errorInfo('NothingToDelete', 'Nothing before the cursor') };
    }
    const [removed] = this.items.splice(this.position - 1, 1);
    this.position--;
    return { ok: true, removed };
  }

  moveCursor(direction: CursorDirection): number {
    this.assertOpen();
    switch (direction) {
      case 'left':
        this.position = Math.max(0, this.position - 1);
        break;
      case 'right':
        this.position = Math.min(this.items.length, this.position + 1);
        break;
      case 'home':
        this.position = 0;
        break;
      case 'end':
        this.position = this.items.length;
        break;
    }
    return this.position;
  }

  clear(): void {
    this.assertOpen();
    this.items = [];
    this.position = 0;
  }

  finalize(): string {
    this.assertOpen();
    this.finalized = true;
    return this.text;
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new EngineError('SessionClosed', 'The buffer has already been finalized');
    }
  }
}
