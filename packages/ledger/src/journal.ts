/**
 * @nestlock/ledger — Undo journal.
 *
 * Every component of a session context records how to undo each of its
 * mutations here. A session opens a mark when it starts and either
 * commits or reverts it when it ends. Reverting discards everything
 * recorded after the mark, newest first, which is how a failed session
 * leaves no trace.
 *
 * Marks nest. Undos are only kept while at least one mark is open, and
 * are dropped once the last open mark closes: nothing outside a session
 * can be reverted.
 */

import { LedgerError } from "./types.js";

/** Restores the state that existed before one mutation. */
export type UndoFn = () => void;

export class Journal {
  private readonly _undos: UndoFn[] = [];
  private readonly _marks: number[] = [];

  /**
   * Record how to undo a mutation that has just been applied.
   * Ignored when no mark is open.
   */
  record(undo: UndoFn): void {
    if (this._marks.length > 0) {
      this._undos.push(undo);
    }
  }

  /**
   * Open a mark at the current position and return it.
   */
  mark(): number {
    const mark = this._undos.length;
    this._marks.push(mark);
    return mark;
  }

  /**
   * Close `mark`, keeping everything recorded after it. The undos stay
   * available to enclosing marks until the outermost one closes.
   */
  commit(mark: number): void {
    this._close(mark);
    this._dropIfIdle();
  }

  /**
   * Close `mark` and undo every mutation recorded after it, newest first.
   */
  revertTo(mark: number): void {
    this._close(mark);

    while (this._undos.length > mark) {
      const undo = this._undos.pop();
      if (undo !== undefined) {
        undo();
      }
    }

    this._dropIfIdle();
  }

  /** Number of marks not yet committed or reverted. */
  get openMarks(): number {
    return this._marks.length;
  }

  get length(): number {
    return this._undos.length;
  }

  private _close(mark: number): void {
    const position = this._marks.lastIndexOf(mark);
    if (position === -1) {
      throw new LedgerError("JOURNAL_MARK_NOT_OPEN", `Journal mark ${String(mark)} is not open`);
    }
    // Marks opened after this one can no longer be closed on their own.
    this._marks.length = position;
  }

  private _dropIfIdle(): void {
    if (this._marks.length === 0) {
      this._undos.length = 0;
    }
  }
}
