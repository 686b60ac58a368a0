/**
 * @nestlock/lock — Append-only lock history.
 *
 * Every acquisition appends an immutable record naming its owner and
 * the index that was active when it opened. Closed records stay in the
 * history so nesting can be audited afterwards; only the cursor moves.
 *
 * Rules:
 * - Records are frozen on creation
 * - Only the record at the cursor can be closed
 * - A closed outermost lock returns the cursor to undefined
 */

import type { LockIndex, LockRecord, ParticipantId } from "@nestlock/types";
import type { Journal } from "@nestlock/ledger";
import { LockError } from "./types.js";

export class LockStack {
  private readonly _records: LockRecord[] = [];
  private _cursor: LockIndex | undefined = undefined;
  private _depth = 0;

  /**
   * @param journal - When given, pushes and pops record their own undo.
   */
  constructor(private readonly _journal?: Journal) {}

  /**
   * Open a lock for `owner` nested under the current cursor.
   */
  push(owner: ParticipantId): LockIndex {
    const index = this._records.length;
    const previousCursor = this._cursor;
    const previousDepth = this._depth;

    const record: LockRecord = Object.freeze({
      owner,
      parentIndex: previousCursor ?? 0,
      depth: previousDepth + 1,
    });

    this._records.push(record);
    this._cursor = index;
    this._depth = previousDepth + 1;

    this._journal?.record(() => {
      this._records.length = index;
      this._cursor = previousCursor;
      this._depth = previousDepth;
    });

    return index;
  }

  /**
   * Close the lock at `index`, which must be the cursor.
   */
  pop(index: LockIndex): LockRecord {
    if (this._cursor === undefined) {
      throw new LockError(
        "INVALID_NESTING",
        `Cannot close lock ${String(index)}: no lock is open`,
      );
    }
    if (index !== this._cursor) {
      throw new LockError(
        "INVALID_NESTING",
        `Cannot close lock ${String(index)}: lock ${String(this._cursor)} is active`,
      );
    }

    const record = this.recordAt(index);
    const previousDepth = this._depth;

    this._depth = previousDepth - 1;
    this._cursor = this._depth === 0 ? undefined : record.parentIndex;

    this._journal?.record(() => {
      this._cursor = index;
      this._depth = previousDepth;
    });

    return record;
  }

  current(): LockIndex | undefined {
    return this._cursor;
  }

  /**
   * Any record in the history, open or closed.
   */
  recordAt(index: LockIndex): LockRecord {
    const record = this._records[index];
    if (record === undefined) {
      throw new LockError(
        "LOCK_NOT_FOUND",
        `No lock at index ${String(index)} (history has ${String(this._records.length)})`,
      );
    }
    return record;
  }

  records(): readonly LockRecord[] {
    return [...this._records];
  }

  get length(): number {
    return this._records.length;
  }

  get depth(): number {
    return this._depth;
  }
}
