import { v4 as uuid } from 'uuid';
import { ROBOT_RULES } from '../world/config.js';
import { ActionClock, ActionLog } from './actionLog.js';
import { KeyedLock } from './locks.js';
import { Robot } from './robot.js';
import { RobotError, invalidArgument, notFound } from './errors.js';
import type {
  ActionPage,
  AttackResult,
  Direction,
  NewRobot,
  RobotRules,
  RobotSnapshot,
  StatePatch,
} from '../types.js';

export interface RegistryOptions {
  rules?: Partial<RobotRules>;
  /** Create robots on first reference instead of failing with NotFound. */
  autoCreate?: boolean;
  seed?: readonly NewRobot[];
  /** Millisecond clock for action timestamps. */
  clock?: () => number;
}

// ─── Lock Order ───
// 1. ITEM_LOCK (registry-wide item ownership; pickup and putdown only)
// 2. robot locks, ascending by robot id
// Every operation takes its locks in this order, which is what keeps two
// attacks in opposite directions from deadlocking.
const ITEM_LOCK = 'items';
const robotKey = (id: string) => `robot:${id}`;

export function lockOrder(robotIds: readonly string[], items = false): string[] {
  const robots = [...new Set(robotIds)].sort().map(robotKey);
  return items ? [ITEM_LOCK, ...robots] : robots;
}

/**
 * Owns every robot of one service instance and is the only way to reach
 * them. Created at service start and closed at service stop.
 */
export class RobotRegistry {
  readonly rules: RobotRules;
  readonly autoCreate: boolean;

  private readonly robots = new Map<string, Robot>();
  private readonly owners = new Map<string, string>(); // itemId → robotId
  private readonly locks = new KeyedLock();
  private readonly log: ActionLog;
  private closed = false;

  constructor(options: RegistryOptions = {}) {
    this.rules = { ...ROBOT_RULES, ...options.rules };
    if (!Number.isSafeInteger(this.rules.moveCost) || this.rules.moveCost < 1) {
      throw invalidArgument('moveCost must be a positive integer');
    }
    this.autoCreate = options.autoCreate ?? false;
    this.log = new ActionLog(new ActionClock(options.clock));

    for (const robot of options.seed ?? []) {
      this.provision(robot);
    }
  }

  get size(): number {
    return this.robots.size;
  }

  // ─── Lifecycle ───

  async create(input: NewRobot = {}): Promise<RobotSnapshot> {
    return this.provision(input).snapshot();
  }

  // Operations already queued on a lock see the closed flag once they get in.
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.robots.clear();
    this.owners.clear();
    this.log.clear();
  }

  // ─── Queries ───

  async list(): Promise<RobotSnapshot[]> {
    this.assertOpen();
    const ids = [...this.robots.keys()].sort();
    return Promise.all(ids.map((id) => this.get(id)));
  }

  async get(id: string): Promise<RobotSnapshot> {
    const robot = this.resolve(id);
    return this.locked(lockOrder([robot.id]), () => robot.snapshot());
  }

  async listActions(id: string, page: number, size: number): Promise<ActionPage> {
    if (!Number.isSafeInteger(page) || page < 1) {
      throw invalidArgument('page must be an integer >= 1');
    }
    if (!Number.isSafeInteger(size) || size < 1) {
      throw invalidArgument('size must be an integer >= 1');
    }
    const robot = this.resolve(id);

    return this.locked(lockOrder([robot.id]), () => {
      const total = this.log.count(robot.id);
      const offset = (page - 1) * size;
      const items = offset < total ? this.log.slice(robot.id, offset, size) : [];
      return {
        items,
        page,
        size,
        total,
        totalPages: Math.max(1, Math.ceil(total / size)),
        hasNext: page * size < total,
        hasPrevious: page > 1,
      };
    });
  }

  // ─── Transitions ───

  async move(id: string, direction: Direction): Promise<RobotSnapshot> {
    const robot = this.resolve(id);
    return this.locked(lockOrder([robot.id]), () => {
      robot.move(direction);
      return robot.snapshot();
    });
  }

  async patchState(id: string, patch: StatePatch): Promise<RobotSnapshot> {
    const robot = this.resolve(id);
    return this.locked(lockOrder([robot.id]), () => {
      robot.applyPatch(patch);
      return robot.snapshot();
    });
  }

  async pickup(id: string, itemId: string): Promise<RobotSnapshot> {
    assertItemId(itemId);
    const robot = this.resolve(id);
    return this.locked(lockOrder([robot.id], true), () => {
      robot.assertActive('pick up items');
      const owner = this.holderOf(itemId);
      if (owner !== undefined) {
        throw new RobotError('Conflict', `Item "${itemId}" is already held by robot "${owner}"`);
      }
      robot.pickup(itemId);
      this.owners.set(itemId, robot.id);
      return robot.snapshot();
    });
  }

  async putdown(id: string, itemId: string): Promise<RobotSnapshot> {
    assertItemId(itemId);
    const robot = this.resolve(id);
    return this.locked(lockOrder([robot.id], true), () => {
      robot.putdown(itemId);
      this.owners.delete(itemId);
      return robot.snapshot();
    });
  }

  async attack(attackerId: string, targetId: string): Promise<AttackResult> {
    const attacker = this.resolve(attackerId);
    const target = this.resolve(targetId);
    if (attacker === target) {
      throw invalidArgument('A robot cannot attack itself');
    }

    return this.locked(lockOrder([attacker.id, target.id]), () => {
      const damage = attacker.attack(target);
      return { attacker: attacker.snapshot(), target: target.snapshot(), damage };
    });
  }

  /** Robot currently holding an item; pickup refuses items that have one. */
  holderOf(itemId: string): string | undefined {
    return this.owners.get(itemId);
  }

  // ─── Internals ───

  private locked<T>(keys: readonly string[], fn: () => T): Promise<T> {
    return this.locks.withKeys(keys, () => {
      this.assertOpen();
      return fn();
    });
  }

  private resolve(id: string): Robot {
    this.assertOpen();
    const robot = this.robots.get(id);
    if (robot) return robot;
    if (this.autoCreate && id !== '') {
      return this.provision({ id });
    }
    throw notFound(id);
  }

  private provision(input: NewRobot): Robot {
    this.assertOpen();
    const id = input.id ?? uuid();
    if (typeof id !== 'string' || id.trim() === '') {
      throw invalidArgument('id must be a non-empty string');
    }
    if (this.robots.has(id)) {
      throw new RobotError('Conflict', `Robot "${id}" already exists`);
    }
    const robot = new Robot(
      id,
      { position: input.position ?? { x: 0, y: 0 }, energy: input.energy ?? this.rules.startingEnergy },
      this.log,
      this.rules,
    );
    this.robots.set(id, robot);
    return robot;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw invalidArgument('Registry is closed');
    }
  }
}

function assertItemId(itemId: string): void {
  if (typeof itemId !== 'string' || itemId.trim() === '') {
    throw invalidArgument('itemId must be a non-empty string');
  }
}
