// ─── Core Types ───

export type Direction = 'up' | 'down' | 'left' | 'right';

export const DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right'];

export interface Position {
  x: number;
  y: number;
}

export type RobotStatus = 'active' | 'incapacitated';

// Point-in-time copy of a robot. Never shares structure with live state.
export interface RobotSnapshot {
  id: string;
  position: Position;
  energy: number;
  inventory: string[];
  status: RobotStatus;
}

export interface NewRobot {
  id?: string;
  position?: Position;
  energy?: number;
}

export interface StatePatch {
  energy?: number;
  position?: Position;
}

// ─── Action Log ───

export type ActionKind =
  | 'move'
  | 'patch'
  | 'pickup'
  | 'putdown'
  | 'attack-outgoing'
  | 'attack-incoming';

export interface MovePayload {
  direction: Direction;
  from: Position;
  to: Position;
  energyCost: number;
}

export interface ItemPayload {
  itemId: string;
}

export interface AttackOutgoingPayload {
  targetId: string;
  damage: number;
  energyCost: number;
  energyAfter: number;
}

export interface AttackIncomingPayload {
  attackerId: string;
  damage: number;
  energyAfter: number;
}

export interface ActionPayloads {
  move: MovePayload;
  patch: StatePatch;
  pickup: ItemPayload;
  putdown: ItemPayload;
  'attack-outgoing': AttackOutgoingPayload;
  'attack-incoming': AttackIncomingPayload;
}

export type ActionPayload = ActionPayloads[ActionKind];

export interface ActionRecord {
  robotId: string;
  sequence: number;
  kind: ActionKind;
  payload: ActionPayload;
  timestamp: string; // ISO-8601
}

export interface ActionPage {
  items: ActionRecord[];
  page: number;
  size: number;
  total: number;
  totalPages: number;
  hasNext: boolean;
  hasPrevious: boolean;
}

export interface AttackResult {
  attacker: RobotSnapshot;
  target: RobotSnapshot;
  damage: number;
}

// ─── Rules ───

export interface RobotRules {
  maxEnergy: number;
  startingEnergy: number;
  moveCost: number;
  attackCost: number;
  attackDamage: number;
  attackRange: number;
}
