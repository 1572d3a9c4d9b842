#!/usr/bin/env npx tsx
/**
 * Robot Entity Tests
 * Verifies: transitions, clamping, incapacitation, log records, attack atomicity
 */

import assert from 'node:assert/strict';
import { ActionClock, ActionLog } from '../engine/actionLog.js';
import { Robot, isDirection, distance } from '../engine/robot.js';
import { ROBOT_RULES } from '../world/config.js';
import type { RobotRules } from '../types.js';
import { test, section, finish, throwsWith } from './harness.js';

const EPOCH = '1970-01-01T00:00:00.000Z';

function setup(rules: Partial<RobotRules> = {}) {
  const log = new ActionLog(new ActionClock(() => 0));
  const merged = { ...ROBOT_RULES, ...rules };
  const make = (id: string, x = 0, y = 0, energy = 100) =>
    new Robot(id, { position: { x, y }, energy }, log, merged);
  return { log, make };
}

async function runTests() {
  console.log('\n🤖 === ROBOT ENTITY TESTS ===');

  section('Construction');

  await test('energy is clamped into [0, 100] on creation', () => {
    const { make } = setup();
    assert.equal(make('a', 0, 0, 150).snapshot().energy, 100);
    const drained = make('b', 0, 0, -5).snapshot();
    assert.equal(drained.energy, 0);
    assert.equal(drained.status, 'incapacitated');
  });

  await test('non-integer position is rejected', () => {
    const { log } = setup();
    throwsWith(
      () => new Robot('a', { position: { x: 0.5, y: 0 }, energy: 100 }, log, ROBOT_RULES),
      'InvalidArgument',
    );
  });

  await test('snapshot is a copy', () => {
    const { make } = setup();
    const robot = make('a');
    const snap = robot.snapshot();
    snap.position.x = 42;
    snap.inventory.push('ghost-item');
    assert.deepEqual(robot.snapshot().position, { x: 0, y: 0 });
    assert.deepEqual(robot.snapshot().inventory, []);
  });

  section('Movement');

  await test('move down spends the move cost and logs from/to', () => {
    const { make, log } = setup();
    const robot = make('a');
    robot.move('down');
    assert.deepEqual(robot.snapshot().position, { x: 0, y: -1 });
    assert.equal(robot.snapshot().energy, 95);

    const [record] = log.slice('a', 0, 10);
    assert.equal(record.sequence, 1);
    assert.equal(record.kind, 'move');
    assert.equal(record.timestamp, EPOCH);
    assert.deepEqual(record.payload, {
      direction: 'down',
      from: { x: 0, y: 0 },
      to: { x: 0, y: -1 },
      energyCost: 5,
    });
  });

  await test('moving with exactly the move cost leaves the robot incapacitated', () => {
    const { make } = setup();
    const robot = make('a', 3, 3, 5);
    robot.move('left');
    assert.deepEqual(robot.snapshot(), {
      id: 'a',
      position: { x: 2, y: 3 },
      energy: 0,
      inventory: [],
      status: 'incapacitated',
    });
    throwsWith(() => robot.move('left'), 'IncapacitatedActor');
  });

  await test('insufficient energy leaves position, energy and log untouched', () => {
    const { make, log } = setup({ moveCost: 10 });
    const robot = make('a', 0, 0, 9);
    throwsWith(() => robot.move('up'), 'InsufficientEnergy');
    assert.deepEqual(robot.snapshot().position, { x: 0, y: 0 });
    assert.equal(robot.snapshot().energy, 9);
    assert.equal(log.count('a'), 0);
  });

  await test('direction guard accepts only the four directions', () => {
    assert.equal(isDirection('up'), true);
    assert.equal(isDirection('right'), true);
    assert.equal(isDirection('north'), false);
    assert.equal(isDirection('toString'), false);
    assert.equal(isDirection(1), false);
  });

  section('Patching');

  await test('patch logs only the fields that changed', () => {
    const { make, log } = setup();
    const robot = make('a');
    const changed = robot.applyPatch({ energy: 100, position: { x: 2, y: 0 } });
    assert.deepEqual(changed, { position: { x: 2, y: 0 } });
    const [record] = log.slice('a', 0, 10);
    assert.equal(record.kind, 'patch');
    assert.deepEqual(record.payload, { position: { x: 2, y: 0 } });
  });

  await test('no-op patch appends nothing', () => {
    const { make, log } = setup();
    const robot = make('a', 1, 1, 60);
    assert.deepEqual(robot.applyPatch({ energy: 60, position: { x: 1, y: 1 } }), {});
    assert.deepEqual(robot.applyPatch({}), {});
    assert.equal(log.count('a'), 0);
  });

  await test('patch clamps energy at both ends', () => {
    const { make } = setup();
    const robot = make('a', 0, 0, 50);
    assert.deepEqual(robot.applyPatch({ energy: 250 }), { energy: 100 });
    assert.deepEqual(robot.applyPatch({ energy: -20 }), { energy: 0 });
    assert.equal(robot.snapshot().status, 'incapacitated');
  });

  await test('patch revives an incapacitated robot', () => {
    const { make } = setup();
    const robot = make('a', 0, 0, 0);
    robot.applyPatch({ energy: 30 });
    assert.equal(robot.snapshot().status, 'active');
    robot.move('up');
    assert.equal(robot.snapshot().energy, 25);
  });

  section('Inventory');

  await test('pickup and putdown keep the inventory sorted and logged', () => {
    const { make, log } = setup();
    const robot = make('a');
    robot.pickup('wrench');
    robot.pickup('bolt');
    assert.deepEqual(robot.snapshot().inventory, ['bolt', 'wrench']);
    assert.equal(robot.holds('wrench'), true);
    robot.putdown('wrench');
    assert.deepEqual(robot.snapshot().inventory, ['bolt']);
    assert.deepEqual(
      log.slice('a', 0, 10).map((r) => [r.sequence, r.kind]),
      [[1, 'pickup'], [2, 'pickup'], [3, 'putdown']],
    );
  });

  await test('picking up a held item conflicts, dropping an absent one is NotHeld', () => {
    const { make } = setup();
    const robot = make('a');
    robot.pickup('bolt');
    throwsWith(() => robot.pickup('bolt'), 'Conflict');
    throwsWith(() => robot.putdown('wrench'), 'NotHeld');
  });

  section('Combat');

  await test('attack damage depends on distance and attack range', () => {
    const { make } = setup({ attackRange: 1 });
    const attacker = make('a', 0, 0);
    const near = make('b', 1, 0);
    const far = make('c', 2, 0);
    assert.equal(distance({ x: 0, y: 0 }, { x: 2, y: 0 }), 2);
    assert.equal(attacker.attack(near), 10);
    assert.equal(attacker.attack(far), 0);
    assert.equal(attacker.snapshot().energy, 90);
    assert.equal(near.snapshot().energy, 90);
    assert.equal(far.snapshot().energy, 100);
  });

  await test('attack writes both sides of the log', () => {
    const { make, log } = setup();
    const attacker = make('a');
    const target = make('b');
    attacker.attack(target);
    const [outgoing] = log.slice('a', 0, 10);
    const [incoming] = log.slice('b', 0, 10);
    assert.equal(outgoing.kind, 'attack-outgoing');
    assert.deepEqual(outgoing.payload, { targetId: 'b', damage: 10, energyCost: 5, energyAfter: 95 });
    assert.equal(incoming.kind, 'attack-incoming');
    assert.deepEqual(incoming.payload, { attackerId: 'a', damage: 10, energyAfter: 90 });
  });

  await test('a rejected log write leaves both sides of an attack untouched', () => {
    const { make, log } = setup();
    const attacker = make('a');
    const target = make('b');
    // Occupy the target's next sequence number so its record is out of order.
    log.append({ robotId: 'b', sequence: 1, kind: 'pickup', payload: { itemId: 'x' } });

    assert.throws(() => attacker.attack(target), /Sequence 1 for robot "b" is out of order \(expected 2\)/);
    assert.equal(attacker.snapshot().energy, 100);
    assert.equal(target.snapshot().energy, 100);
    assert.equal(log.count('a'), 0);

    attacker.pickup('y');
    assert.equal(log.slice('a', 0, 10)[0].sequence, 1);
  });

  await test('self attack is rejected', () => {
    const { make } = setup();
    const robot = make('a');
    throwsWith(() => robot.attack(robot), 'InvalidArgument');
  });

  section('Action Log');

  await test('appendAll checks every draft before storing any', () => {
    const log = new ActionLog(new ActionClock(() => 0));
    assert.throws(
      () =>
        log.appendAll([
          { robotId: 'a', sequence: 1, kind: 'pickup', payload: { itemId: 'x' } },
          { robotId: 'b', sequence: 2, kind: 'pickup', payload: { itemId: 'y' } },
        ]),
      /out of order/,
    );
    assert.equal(log.count('a'), 0);
    assert.equal(log.count('b'), 0);

    const stored = log.appendAll([
      { robotId: 'a', sequence: 1, kind: 'pickup', payload: { itemId: 'x' } },
      { robotId: 'a', sequence: 2, kind: 'putdown', payload: { itemId: 'x' } },
    ]);
    assert.deepEqual(stored.map((r) => r.sequence), [1, 2]);
    assert.equal(log.count('a'), 2);
  });

  await test('records handed out are copies', () => {
    const log = new ActionLog(new ActionClock(() => 0));
    log.append({ robotId: 'a', sequence: 1, kind: 'patch', payload: { energy: 40 } });
    const [record] = log.slice('a', 0, 1);
    record.payload = { energy: 99 };
    assert.deepEqual(log.slice('a', 0, 1)[0].payload, { energy: 40 });
  });

  section('Clock');

  await test('timestamps never go backwards', () => {
    const ticks = [1000, 500, 2000];
    const clock = new ActionClock(() => ticks.shift() ?? 0);
    assert.equal(clock.now(), '1970-01-01T00:00:01.000Z');
    assert.equal(clock.now(), '1970-01-01T00:00:01.000Z');
    assert.equal(clock.now(), '1970-01-01T00:00:02.000Z');
  });

  finish('Robot entity');
}

runTests().catch((err) => {
  console.error(err);
  process.exit(1);
});
