import type { NewRobot, RobotRules } from '../types.js';

// ─── Robot Rules ───
export const ROBOT_RULES: RobotRules = {
  maxEnergy: 100,
  startingEnergy: 100,
  moveCost: 5,
  attackCost: 5,
  attackDamage: 10,
  attackRange: 0, // Manhattan distance; 0 = same tile only
};

export const PAGINATION = {
  DEFAULT_PAGE: 1,
  DEFAULT_SIZE: 5,
  MAX_SIZE: 100,
} as const;

// Robots provisioned at startup unless SEED_ROBOTS=false
export const SEED_ROBOTS: NewRobot[] = [
  { id: 'r1', position: { x: 0, y: 0 }, energy: 100 },
  { id: 'r2', position: { x: 1, y: 0 }, energy: 100 },
];

export interface ServiceConfig {
  port: number;
  devMode: boolean;
  autoCreate: boolean;
  seed: NewRobot[];
  rules: RobotRules;
}

function readInt(raw: string | undefined, fallback: number, min: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    console.warn(`[Config] Ignoring invalid value "${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const maxEnergy = ROBOT_RULES.maxEnergy;
  return {
    port: readInt(env.PORT, 3000, 1),
    devMode: env.DEV_MODE === 'true',
    autoCreate: env.AUTO_CREATE === 'true',
    seed: env.SEED_ROBOTS === 'false' ? [] : SEED_ROBOTS,
    rules: {
      maxEnergy,
      startingEnergy: Math.min(maxEnergy, readInt(env.STARTING_ENERGY, ROBOT_RULES.startingEnergy, 0)),
      moveCost: readInt(env.MOVE_COST, ROBOT_RULES.moveCost, 1),
      attackCost: readInt(env.ATTACK_COST, ROBOT_RULES.attackCost, 0),
      attackDamage: readInt(env.ATTACK_DAMAGE, ROBOT_RULES.attackDamage, 0),
      attackRange: readInt(env.ATTACK_RANGE, ROBOT_RULES.attackRange, 0),
    },
  };
}
