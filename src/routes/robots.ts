import { Hono, type Context } from 'hono';
import { invalidArgument } from '../engine/errors.js';
import { isDirection } from '../engine/robot.js';
import type { RobotRegistry } from '../engine/registry.js';
import { PAGINATION } from '../world/config.js';
import { DIRECTIONS, type NewRobot, type Position, type StatePatch } from '../types.js';

// ─── Hypermedia Links ───

type Link = { href: string; method?: string; templated?: boolean };

export function statusLinks(robotId: string): Record<string, Link> {
  const base = `/robots/${encodeURIComponent(robotId)}`;
  return {
    self: { href: `${base}/status` },
    actions: { href: `${base}/actions?page=${PAGINATION.DEFAULT_PAGE}&size=${PAGINATION.DEFAULT_SIZE}` },
    move: { href: `${base}/move`, method: 'POST' },
    pickup: { href: `${base}/pickup/{itemId}`, templated: true, method: 'POST' },
    putdown: { href: `${base}/putdown/{itemId}`, templated: true, method: 'POST' },
    attack: { href: `${base}/attack/{targetId}`, templated: true, method: 'POST' },
    update_state: { href: `${base}/state`, method: 'PATCH' },
  };
}

export function pageLinks(robotId: string, page: number, size: number, totalPages: number): Record<string, Link> {
  const href = (p: number) => `/robots/${encodeURIComponent(robotId)}/actions?page=${p}&size=${size}`;
  const links: Record<string, Link> = { self: { href: href(page) } };
  if (page < totalPages) links.next = { href: href(page + 1) };
  if (page > 1) links.prev = { href: href(page - 1) };
  return links;
}

// ─── Request Parsing ───

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readBody(c: Context): Promise<unknown> {
  const text = await c.req.text();
  if (text.trim() === '') return {};
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    throw invalidArgument('Request body must be valid JSON');
  }
}

function rejectUnknownFields(body: Record<string, unknown>, allowed: readonly string[]): void {
  const unknown = Object.keys(body).filter((key) => !allowed.includes(key));
  if (unknown.length > 0) {
    throw invalidArgument(`Unknown field(s): ${unknown.join(', ')}`);
  }
}

function parseInteger(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    throw invalidArgument(`${field} must be an integer`);
  }
  return value;
}

function parsePosition(value: unknown): Position {
  if (!isRecord(value)) {
    throw invalidArgument('position must be an object with integer x and y');
  }
  rejectUnknownFields(value, ['x', 'y']);
  return { x: parseInteger(value.x, 'position.x'), y: parseInteger(value.y, 'position.y') };
}

export function parsePatch(body: unknown): StatePatch {
  if (!isRecord(body)) {
    throw invalidArgument('Request body must be a JSON object');
  }
  rejectUnknownFields(body, ['energy', 'position']);
  const patch: StatePatch = {};
  if (body.energy !== undefined && body.energy !== null) {
    patch.energy = parseInteger(body.energy, 'energy');
  }
  if (body.position !== undefined && body.position !== null) {
    patch.position = parsePosition(body.position);
  }
  return patch;
}

export function parseNewRobot(body: unknown): NewRobot {
  if (!isRecord(body)) {
    throw invalidArgument('Request body must be a JSON object');
  }
  rejectUnknownFields(body, ['id', 'energy', 'position']);
  const robot: NewRobot = parsePatch({ energy: body.energy, position: body.position });
  if (body.id !== undefined) {
    if (typeof body.id !== 'string' || body.id.trim() === '') {
      throw invalidArgument('id must be a non-empty string');
    }
    robot.id = body.id;
  }
  return robot;
}

function parseQueryInt(raw: string | undefined, field: string, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  if (!/^-?\d+$/.test(raw)) {
    throw invalidArgument(`${field} must be an integer`);
  }
  return Number(raw);
}

// ─── Routes ───

export function createRobotRoutes(registry: RobotRegistry) {
  const robots = new Hono();

  // GET /robots — All robots
  robots.get('/', async (c) => {
    return c.json({ robots: await registry.list() });
  });

  // POST /robots — Provision a robot
  robots.post('/', async (c) => {
    const robot = await registry.create(parseNewRobot(await readBody(c)));
    console.log(`[Robots] Created ${robot.id} at (${robot.position.x}, ${robot.position.y})`);
    return c.json({ ...robot, _links: statusLinks(robot.id) }, 201);
  });

  // GET /robots/:id/status — Current snapshot
  robots.get('/:id/status', async (c) => {
    const robot = await registry.get(c.req.param('id'));
    return c.json({ ...robot, _links: statusLinks(robot.id) });
  });

  // POST /robots/:id/move — { direction }
  robots.post('/:id/move', async (c) => {
    const body = await readBody(c);
    const direction = isRecord(body) ? body.direction : undefined;
    if (!isDirection(direction)) {
      throw invalidArgument(`direction must be one of ${DIRECTIONS.join(', ')}`);
    }
    const robot = await registry.move(c.req.param('id'), direction);
    return c.json({ message: 'moved', robot });
  });

  // PATCH /robots/:id/state — { energy?, position? }
  robots.patch('/:id/state', async (c) => {
    const robot = await registry.patchState(c.req.param('id'), parsePatch(await readBody(c)));
    return c.json({ message: 'updated', robot });
  });

  robots.post('/:id/pickup/:itemId', async (c) => {
    const robot = await registry.pickup(c.req.param('id'), c.req.param('itemId'));
    return c.json({ message: 'picked up', robot });
  });

  robots.post('/:id/putdown/:itemId', async (c) => {
    const robot = await registry.putdown(c.req.param('id'), c.req.param('itemId'));
    return c.json({ message: 'put down', robot });
  });

  // POST /robots/:id/attack/:targetId
  robots.post('/:id/attack/:targetId', async (c) => {
    const result = await registry.attack(c.req.param('id'), c.req.param('targetId'));
    return c.json({ message: 'attack executed', ...result });
  });

  // GET /robots/:id/actions?page=1&size=5 — Paginated action log
  robots.get('/:id/actions', async (c) => {
    const page = parseQueryInt(c.req.query('page'), 'page', PAGINATION.DEFAULT_PAGE);
    const size = parseQueryInt(c.req.query('size'), 'size', PAGINATION.DEFAULT_SIZE);
    if (size > PAGINATION.MAX_SIZE) {
      throw invalidArgument(`size must be at most ${PAGINATION.MAX_SIZE}`);
    }
    const id = c.req.param('id');
    const result = await registry.listActions(id, page, size);
    return c.json({ ...result, _links: pageLinks(id, result.page, result.size, result.totalPages) });
  });

  return robots;
}
