import { RobotError, invalidArgument } from './errors.js';
import type { ActionDraft, ActionLog } from './actionLog.js';
import type {
  ActionKind,
  ActionPayloads,
  Direction,
  Position,
  RobotRules,
  RobotSnapshot,
  RobotStatus,
  StatePatch,
} from '../types.js';

const STEPS: Record<Direction, Position> = {
  up: { x: 0, y: 1 },
  down: { x: 0, y: -1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

export function isDirection(value: unknown): value is Direction {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(STEPS, value);
}

export function clampEnergy(energy: number, max: number): number {
  return Math.min(max, Math.max(0, energy));
}

export function distance(a: Position, b: Position): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function assertPosition(value: Position, field = 'position'): void {
  if (!Number.isSafeInteger(value.x) || !Number.isSafeInteger(value.y)) {
    throw invalidArgument(`${field} must have integer x and y`);
  }
}

export function assertEnergy(value: number): void {
  if (!Number.isSafeInteger(value)) {
    throw invalidArgument('energy must be an integer');
  }
}

const samePosition = (a: Position, b: Position) => a.x === b.x && a.y === b.y;

/**
 * A single robot and its state transitions.
 *
 * Every transition validates first, then appends its action record, then
 * assigns the new state. A throw at any point before the assignment leaves
 * the robot exactly as it was. Callers are expected to hold this robot's lock.
 */
export class Robot {
  readonly id: string;
  private position: Position;
  private energy: number;
  private readonly inventory = new Set<string>();
  private lastSequence = 0;

  constructor(
    id: string,
    init: { position: Position; energy: number },
    private readonly log: ActionLog,
    private readonly rules: RobotRules,
  ) {
    assertPosition(init.position);
    assertEnergy(init.energy);
    this.id = id;
    this.position = { ...init.position };
    this.energy = clampEnergy(init.energy, rules.maxEnergy);
  }

  get status(): RobotStatus {
    return this.energy === 0 ? 'incapacitated' : 'active';
  }

  holds(itemId: string): boolean {
    return this.inventory.has(itemId);
  }

  snapshot(): RobotSnapshot {
    return {
      id: this.id,
      position: { ...this.position },
      energy: this.energy,
      inventory: [...this.inventory].sort(),
      status: this.status,
    };
  }

  // ─── Transitions ───

  move(direction: Direction): void {
    if (!isDirection(direction)) {
      throw invalidArgument(`direction must be one of ${Object.keys(STEPS).join(', ')}`);
    }
    this.assertActive('move');
    const cost = this.rules.moveCost;
    if (this.energy < cost) {
      throw new RobotError(
        'InsufficientEnergy',
        `Robot "${this.id}" needs ${cost} energy to move, has ${this.energy}`,
      );
    }

    const step = STEPS[direction];
    const to = { x: this.position.x + step.x, y: this.position.y + step.y };
    this.record('move', { direction, from: { ...this.position }, to: { ...to }, energyCost: cost });
    this.position = to;
    this.energy = clampEnergy(this.energy - cost, this.rules.maxEnergy);
  }

  /** Returns the fields that actually changed; nothing is logged for a no-op. */
  applyPatch(patch: StatePatch): StatePatch {
    if (patch.energy !== undefined) assertEnergy(patch.energy);
    if (patch.position !== undefined) assertPosition(patch.position);

    const changed: StatePatch = {};
    if (patch.energy !== undefined) {
      const energy = clampEnergy(patch.energy, this.rules.maxEnergy);
      if (energy !== this.energy) changed.energy = energy;
    }
    if (patch.position !== undefined && !samePosition(patch.position, this.position)) {
      changed.position = { x: patch.position.x, y: patch.position.y };
    }
    if (changed.energy === undefined && changed.position === undefined) {
      return changed;
    }

    this.record('patch', changed);
    if (changed.energy !== undefined) this.energy = changed.energy;
    if (changed.position) this.position = { ...changed.position };
    return changed;
  }

  // Registry-wide ownership is checked by the registry; this only guards
  // against picking up something already held here.
  pickup(itemId: string): void {
    this.assertActive('pick up items');
    if (this.inventory.has(itemId)) {
      throw new RobotError('Conflict', `Item "${itemId}" is already held by robot "${this.id}"`);
    }
    this.record('pickup', { itemId });
    this.inventory.add(itemId);
  }

  putdown(itemId: string): void {
    this.assertActive('put down items');
    if (!this.inventory.has(itemId)) {
      throw new RobotError('NotHeld', `Item "${itemId}" is not in robot "${this.id}" inventory`);
    }
    this.record('putdown', { itemId });
    this.inventory.delete(itemId);
  }

  /**
   * Resolve an attack on `target`. Both log records are appended as one
   * batch before either robot's energy changes. Returns the damage
   * dealt; the target's lock must be held as well.
   */
  attack(target: Robot): number {
    if (target.id === this.id) {
      throw invalidArgument('A robot cannot attack itself');
    }
    this.assertActive('attack');
    const cost = this.rules.attackCost;
    if (this.energy < cost) {
      throw new RobotError(
        'InsufficientEnergy',
        `Robot "${this.id}" needs ${cost} energy to attack, has ${this.energy}`,
      );
    }

    const damage =
      distance(this.position, target.position) <= this.rules.attackRange ? this.rules.attackDamage : 0;
    const attackerEnergy = clampEnergy(this.energy - cost, this.rules.maxEnergy);
    const targetEnergy = clampEnergy(target.energy - damage, this.rules.maxEnergy);

    this.log.appendAll([
      this.draft('attack-outgoing', {
        targetId: target.id,
        damage,
        energyCost: cost,
        energyAfter: attackerEnergy,
      }),
      target.draft('attack-incoming', {
        attackerId: this.id,
        damage,
        energyAfter: targetEnergy,
      }),
    ]);
    this.lastSequence += 1;
    target.lastSequence += 1;
    this.energy = attackerEnergy;
    target.energy = targetEnergy;
    return damage;
  }

  assertActive(what: string): void {
    if (this.energy === 0) {
      throw new RobotError('IncapacitatedActor', `Robot "${this.id}" is incapacitated and cannot ${what}`);
    }
  }

  // ─── Internals ───

  private draft<K extends ActionKind>(kind: K, payload: ActionPayloads[K]): ActionDraft<K> {
    return { robotId: this.id, sequence: this.lastSequence + 1, kind, payload };
  }

  private record<K extends ActionKind>(kind: K, payload: ActionPayloads[K]): void {
    this.log.append(this.draft(kind, payload));
    this.lastSequence += 1;
  }
}
