import type { ActionPayloads, ActionKind, ActionRecord } from '../types.js';

// Wall clock that never runs backwards, so timestamps are non-decreasing
// even when the system clock is adjusted.
export class ActionClock {
  private last = 0;

  constructor(private readonly source: () => number = Date.now) {}

  now(): string {
    this.last = Math.max(this.last, this.source());
    return new Date(this.last).toISOString();
  }
}

export interface ActionDraft<K extends ActionKind = ActionKind> {
  robotId: string;
  sequence: number;
  kind: K;
  payload: ActionPayloads[K];
}

/**
 * Append-only store of action records for every robot in one registry,
 * one array per robot in sequence order. Records are never updated or deleted.
 */
export class ActionLog {
  private readonly records = new Map<string, ActionRecord[]>();

  constructor(private readonly clock: ActionClock = new ActionClock()) {}

  append(draft: ActionDraft): ActionRecord {
    return this.appendAll([draft])[0];
  }

  /** Append several records atomically: all land or none do. */
  appendAll(drafts: readonly ActionDraft[]): ActionRecord[] {
    const next = new Map<string, number>();
    for (const draft of drafts) {
      const expected = next.get(draft.robotId) ?? this.count(draft.robotId) + 1;
      if (draft.sequence !== expected) {
        throw new Error(
          `Sequence ${draft.sequence} for robot "${draft.robotId}" is out of order (expected ${expected})`,
        );
      }
      next.set(draft.robotId, expected + 1);
    }

    const timestamp = this.clock.now();
    return drafts.map((draft) => {
      const record: ActionRecord = structuredClone({ ...draft, timestamp });
      const list = this.records.get(draft.robotId);
      if (list) {
        list.push(record);
      } else {
        this.records.set(draft.robotId, [record]);
      }
      return structuredClone(record);
    });
  }

  count(robotId: string): number {
    return this.records.get(robotId)?.length ?? 0;
  }

  /** Records ordered by sequence, ascending. */
  slice(robotId: string, offset: number, limit: number): ActionRecord[] {
    const list = this.records.get(robotId) ?? [];
    return list.slice(offset, offset + limit).map((record) => structuredClone(record));
  }

  clear(): void {
    this.records.clear();
  }
}
