import { describe, expect, test } from 'vitest';
import {
    characterSystem,
    ControlMode,
    ControllerError,
    ControllerErrorKind,
    GroundState,
    JumpPhase,
    type Logger,
    type PhysicsBackend,
    ProbeShapeType,
    StepResult,
    StepStatus,
} from '../../src';
import * as boxWorld from '../box-world';
import {
    addTestBody,
    addTestCharacter,
    CONTACT_OFFSET,
    createTestSystem,
    createTestWorld,
    RESTING_Y,
    TEST_SHAPE,
    tick,
    walkIntent,
} from '../helpers';

/** a logger that keeps its messages */
const createRecordingLogger = () => {
    const warnings: string[] = [];
    const errors: string[] = [];
    const logger: Logger = {
        debug: () => {},
        warn: (message) => {
            warnings.push(message);
        },
        error: (message) => {
            errors.push(message);
        },
    };
    return { logger, warnings, errors };
};

describe('characterSystem - lifecycle', () => {
    test('add, get, findByBody and remove', () => {
        const { world, backend } = createTestWorld();
        const body = addTestBody(world);
        const system = createTestSystem(backend);

        const character = addTestCharacter(system, body.id);

        expect(characterSystem.get(system, character.id)).toBe(character);
        expect(characterSystem.findByBody(system, body.id)).toBe(character);
        expect(character.settings.mode).toBe(ControlMode.KINEMATIC);
        expect(character.lastStatus).toBe(StepStatus.OK);

        expect(characterSystem.remove(system, character.id)).toBe(true);
        expect(characterSystem.remove(system, character.id)).toBe(false);
        expect(characterSystem.get(system, character.id)).toBeUndefined();
        expect(characterSystem.findByBody(system, body.id)).toBeUndefined();

        // the body is left to the host
        expect(boxWorld.getBody(world, body.id)).toBe(body);
    });

    test('stale ids are rejected after the slot is reused', () => {
        const { world, backend } = createTestWorld();
        const system = createTestSystem(backend);
        const first = addTestCharacter(system, addTestBody(world).id);
        const staleId = first.id;

        characterSystem.remove(system, staleId);
        const second = addTestCharacter(system, addTestBody(world, [3, RESTING_Y, 0]).id);

        expect(second.id).not.toBe(staleId);
        expect(characterSystem.get(system, staleId)).toBeUndefined();
        expect(characterSystem.setIntent(system, staleId, walkIntent([1, 0, 0], 5))).toBe(false);
        expect(characterSystem.setSettings(system, staleId, { jumpVelocity: 8 })).toBe(false);
        expect(characterSystem.get(system, second.id)).toBe(second);
        expect(second.intent.speed).toBe(0);
    });

    test('per-character settings override the system defaults', () => {
        const { world, backend } = createTestWorld();
        const system = createTestSystem(backend, { jumpVelocity: 7 });

        const a = addTestCharacter(system, addTestBody(world).id);
        const b = addTestCharacter(system, addTestBody(world, [3, RESTING_Y, 0]).id, { maxJumps: 2 });

        expect(a.settings.jumpVelocity).toBe(7);
        expect(a.settings.maxJumps).toBe(1);
        expect(b.settings.jumpVelocity).toBe(7);
        expect(b.settings.maxJumps).toBe(2);
        expect([...characterSystem.iterate(system)]).toEqual([a, b]);
    });

    test('invalid settings or bodies are rejected and nothing is added', () => {
        const { world, backend } = createTestWorld();
        const body = addTestBody(world);
        const system = createTestSystem(backend);

        expect(() => addTestCharacter(system, body.id, { skinWidth: 0 })).toThrow(ControllerError);
        expect(() =>
            characterSystem.add(system, { ref: body.id, shape: { type: ProbeShapeType.CAPSULE, halfHeight: 0.5, radius: 0 }, mass: 70 }),
        ).toThrow(ControllerError);
        expect(() => characterSystem.add(system, { ref: body.id, shape: TEST_SHAPE, mass: -1 })).toThrow(ControllerError);

        expect([...characterSystem.iterate(system)]).toHaveLength(0);
    });

    test('setSettings validates and keeps the old settings on failure', () => {
        const { world, backend } = createTestWorld();
        const system = createTestSystem(backend);
        const character = addTestCharacter(system, addTestBody(world).id);

        expect(() => characterSystem.setSettings(system, character.id, { skinWidth: 0 })).toThrow(ControllerError);
        expect(character.settings.skinWidth).toBe(0.02);

        expect(characterSystem.setSettings(system, character.id, { jumpVelocity: 8 })).toBe(true);
        expect(character.settings.jumpVelocity).toBe(8);
    });

    test('updateAll rejects a non-positive dt', () => {
        const { backend } = createTestWorld();
        const system = createTestSystem(backend);

        expect(() => characterSystem.updateAll(system, 0)).toThrow();
        expect(() => characterSystem.updateAll(system, Number.NaN)).toThrow();
    });
});

describe('characterSystem - movement', () => {
    test('walking accelerates to the target speed and stops exactly', () => {
        const { world, backend } = createTestWorld();
        const body = addTestBody(world);
        const system = createTestSystem(backend);
        const character = addTestCharacter(system, body.id);

        characterSystem.setIntent(system, character.id, walkIntent([1, 0, 0], 5));
        tick(system, 1);

        expect(character.ground.state).toBe(GroundState.GROUNDED);
        expect(character.jump.phase).toBe(JumpPhase.GROUNDED);
        expect(character.output.velocity[0]).toBeCloseTo(1, 9);
        expect(character.output.velocity[1]).toBe(-0.5);

        tick(system, 9);

        expect(character.output.velocity[0]).toBe(5);
        expect(character.output.velocity[2]).toBe(0);
        expect(character.ground.state).toBe(GroundState.GROUNDED);
        expect(body.position[0]).toBeGreaterThan(0.5);
        expect(body.position[1]).toBeGreaterThan(0.8);
        expect(body.position[1]).toBeLessThanOrEqual(RESTING_Y + 1e-9);

        characterSystem.setIntent(system, character.id, walkIntent([0, 0, 0], 0));
        tick(system, 10);

        expect(character.output.velocity[0]).toBe(0);
        expect(character.velocity[0]).toBe(0);
    });

    test('jumping launches with the jump velocity and lands again', () => {
        const { world, backend } = createTestWorld();
        const body = addTestBody(world);
        const system = createTestSystem(backend);
        const character = addTestCharacter(system, body.id);
        tick(system, 2);

        characterSystem.setIntent(system, character.id, walkIntent([0, 0, 0], 0, true));
        tick(system, 1);

        expect(character.jump.jumpedThisTick).toBe(true);
        expect(character.output.velocity[1]).toBe(6);
        expect(body.position[1]).toBeCloseTo(RESTING_Y + 0.1, 9);
        // the press was consumed
        expect(character.intent.jump).toBe(false);

        tick(system, 1);
        expect(character.ground.state).toBe(GroundState.AIRBORNE);
        expect(character.output.velocity[1]).toBeCloseTo(6 - 9.81 / 60, 9);

        tick(system, 120);
        expect(character.ground.state).toBe(GroundState.GROUNDED);
        expect(character.jump.phase).toBe(JumpPhase.GROUNDED);
        expect(body.position[1]).toBeCloseTo(RESTING_Y, 6);
    });

    test('a jump press survives until a tick consumes it', () => {
        const { world, backend } = createTestWorld();
        const system = createTestSystem(backend);
        const character = addTestCharacter(system, addTestBody(world).id);
        tick(system, 2);

        characterSystem.setIntent(system, character.id, walkIntent([0, 0, 0], 0, true));
        characterSystem.setIntent(system, character.id, walkIntent([0, 0, 0], 0, false));
        expect(character.intent.jump).toBe(true);

        tick(system, 1);
        expect(character.jump.jumpedThisTick).toBe(true);
    });

    test('hitting a ceiling ends the rise', () => {
        const { world, backend } = createTestWorld();
        const body = addTestBody(world);
        // head top at RESTING_Y + 0.8, ceiling 0.05 above it
        boxWorld.addBox(world, [-2, RESTING_Y + 0.85, -2], [2, 4, 2]);
        const system = createTestSystem(backend);
        const character = addTestCharacter(system, body.id);
        tick(system, 2);

        characterSystem.setIntent(system, character.id, walkIntent([0, 0, 0], 0, true));
        tick(system, 1);

        expect(character.jump.verticalVelocity).toBe(0);
        expect(character.velocity[1]).toBe(0);
        expect(body.position[1]).toBeCloseTo(RESTING_Y + 0.049, 6);
    });

    test('walks up a low step', () => {
        const { world, backend } = createTestWorld();
        boxWorld.addBox(world, [0.5, 0, -5], [20, 0.2, 5]);
        const body = addTestBody(world);
        const system = createTestSystem(backend);
        const character = addTestCharacter(system, body.id);

        characterSystem.setIntent(system, character.id, walkIntent([1, 0, 0], 5));
        tick(system, 60);

        expect(body.position[0]).toBeGreaterThan(2);
        expect(body.position[1]).toBeCloseTo(1.0, 2);
        expect(character.ground.state).toBe(GroundState.GROUNDED);
    });

    test('is blocked by a step above the step height', () => {
        const { world, backend } = createTestWorld();
        boxWorld.addBox(world, [0.5, 0, -5], [20, 0.5, 5]);
        const body = addTestBody(world);
        const system = createTestSystem(backend);
        const character = addTestCharacter(system, body.id);

        characterSystem.setIntent(system, character.id, walkIntent([1, 0, 0], 5));
        tick(system, 60);

        expect(body.position[0]).toBeLessThan(0.2);
        expect(body.position[1]).toBeCloseTo(RESTING_Y, 2);
        expect(character.output.blocked).toBe(true);
        expect(character.output.velocity[0]).toBeCloseTo(0, 9);
    });

    test('VELOCITY mode sets the body velocity', () => {
        const { world, backend } = createTestWorld();
        const body = addTestBody(world);
        const system = createTestSystem(backend, { mode: ControlMode.VELOCITY });
        const character = addTestCharacter(system, body.id);

        characterSystem.setIntent(system, character.id, walkIntent([0, 0, 1], 5));
        tick(system, 1);

        expect(body.linearVelocity[0]).toBe(0);
        expect(body.linearVelocity[1]).toBe(-0.5);
        expect(body.linearVelocity[2]).toBeCloseTo(1, 9);
        expect(body.position[1]).toBe(RESTING_Y);
    });

    test('FORCE mode applies the force that reaches the velocity in one tick', () => {
        const { world, backend } = createTestWorld();
        const body = addTestBody(world);
        const system = createTestSystem(backend, { mode: ControlMode.FORCE });
        const character = addTestCharacter(system, body.id);

        characterSystem.setIntent(system, character.id, walkIntent([0, 0, 1], 5));
        tick(system, 1);

        expect(body.force[0]).toBe(0);
        expect(body.force[1]).toBeCloseTo(-0.5 * 70 * 60, 6);
        expect(body.force[2]).toBeCloseTo(70 * 60, 6);
    });

    test('IMPULSE mode applies the momentum change that reaches the velocity', () => {
        const { world, backend } = createTestWorld();
        const body = boxWorld.addBody(world, {
            shape: TEST_SHAPE,
            position: [0, RESTING_Y, 0],
            motionType: boxWorld.MotionType.DYNAMIC,
            mass: 70,
            gravityFactor: 0,
        });
        const system = createTestSystem(backend, { mode: ControlMode.IMPULSE });
        const character = addTestCharacter(system, body.id);

        characterSystem.setIntent(system, character.id, walkIntent([0, 0, 1], 5));
        tick(system, 1);

        expect(character.output.vector[1]).toBeCloseTo(-0.5 * 70, 9);
        expect(character.output.vector[2]).toBeCloseTo(70, 9);
        expect(body.linearVelocity[0]).toBe(0);
        expect(body.linearVelocity[1]).toBeCloseTo(-0.5, 9);
        expect(body.linearVelocity[2]).toBeCloseTo(1, 9);
    });
});

const RAMP_ANGLE = Math.PI / 6;

/** a 30° ramp through the origin rising toward +x, with a body resting 0.001 above it at x = 5 */
const createRampWorld = () => {
    const world = boxWorld.create();
    const backend = boxWorld.createBackend(world);
    boxWorld.addRamp(world, { center: [0, 0, 0], angle: RAMP_ANGLE, halfExtentX: 10, halfExtentZ: 5 });
    // the box's downhill-most bottom corner is 0.3 uphill of its centre
    const body = addTestBody(world, [5, Math.tan(RAMP_ANGLE) * 5.3 + RESTING_Y, 0]);
    return { world, backend, body };
};

describe('characterSystem - ground snapping', () => {
    test('walking down a ramp snaps to it and stays grounded', () => {
        const { backend, body } = createRampWorld();
        const system = createTestSystem(backend);
        const character = addTestCharacter(system, body.id);
        characterSystem.setIntent(system, character.id, walkIntent([-1, 0, 0], 5));

        const snapped: boolean[] = [];
        const phases: JumpPhase[] = [];
        for (let i = 0; i < 16; i++) {
            tick(system, 1);
            snapped.push(character.ground.snapped);
            phases.push(character.jump.phase);
            expect(character.ground.state).toBe(GroundState.GROUNDED);
        }

        // the gap below the body outgrows the skin width on the fourth tick
        expect(snapped.slice(0, 4)).toEqual([false, false, false, true]);
        expect(snapped.slice(4)).toEqual(new Array(12).fill(true));
        expect(phases).toEqual(new Array(16).fill(JumpPhase.GROUNDED));
        expect(character.ground.angle).toBeCloseTo(RAMP_ANGLE, 9);
        expect(body.position[0]).toBeLessThan(4);

        characterSystem.setIntent(system, character.id, walkIntent([-1, 0, 0], 5, true));
        tick(system, 1);

        expect(character.jump.jumpedThisTick).toBe(true);
    });

    test('without snapping the same walk leaves the ground', () => {
        const { backend, body } = createRampWorld();
        const system = createTestSystem(backend, { groundSnapDistance: 0 });
        const character = addTestCharacter(system, body.id);
        characterSystem.setIntent(system, character.id, walkIntent([-1, 0, 0], 5));

        tick(system, 3);
        expect(character.jump.phase).toBe(JumpPhase.GROUNDED);

        tick(system, 1);
        expect(character.ground.state).toBe(GroundState.AIRBORNE);
        expect(character.ground.snapped).toBe(false);
        expect(character.jump.phase).toBe(JumpPhase.COYOTE);
    });

    test('does not snap while rising from a jump', () => {
        const { world, backend } = createTestWorld();
        const body = addTestBody(world);
        const system = createTestSystem(backend, { jumpVelocity: 3 });
        const character = addTestCharacter(system, body.id);
        tick(system, 2);

        characterSystem.setIntent(system, character.id, walkIntent([0, 0, 0], 0, true));
        tick(system, 2);

        // the launch tick rose 3 / 60, the floor is still within the probe distance
        expect(character.ground.distance).toBeCloseTo(CONTACT_OFFSET + 0.05, 9);
        expect(character.ground.state).toBe(GroundState.AIRBORNE);
        expect(character.ground.snapped).toBe(false);
        expect(character.jump.phase).toBe(JumpPhase.AIRBORNE);
        expect(body.position[1]).toBeCloseTo(RESTING_Y + 0.05 + (3 - 9.81 / 60) / 60, 9);
    });
});

describe('characterSystem - flying', () => {
    test('flies along the intent direction without gravity', () => {
        const { world, backend } = createTestWorld();
        const body = addTestBody(world);
        const system = createTestSystem(backend);
        const character = addTestCharacter(system, body.id);

        const up = walkIntent([0, 1, 0], 5);
        up.fly = true;
        characterSystem.setIntent(system, character.id, up);
        tick(system, 10);

        expect(character.jump.phase).toBe(JumpPhase.AIRBORNE);
        expect(character.jump.verticalVelocity).toBe(0);
        expect(character.output.velocity[1]).toBe(5);
        expect(character.step.result).toBe(StepResult.NONE);
        // 1 + 2 + 3 + 4 + 5 m/s ramp up, then 5 ticks at 5 m/s
        expect(body.position[1]).toBeCloseTo(RESTING_Y + 40 / 60, 9);

        const hover = walkIntent([0, 0, 0], 0);
        hover.fly = true;
        characterSystem.setIntent(system, character.id, hover);
        tick(system, 10);

        expect(character.output.velocity[1]).toBe(0);
        expect(body.position[1]).toBeCloseTo(RESTING_Y + 50 / 60, 9);

        tick(system, 10);
        expect(body.position[1]).toBeCloseTo(RESTING_Y + 50 / 60, 9);
    });

    test('falls and lands once flying stops', () => {
        const { world, backend } = createTestWorld();
        const body = addTestBody(world, [0, RESTING_Y + 1, 0]);
        const system = createTestSystem(backend);
        const character = addTestCharacter(system, body.id);

        const hover = walkIntent([0, 0, 0], 0);
        hover.fly = true;
        characterSystem.setIntent(system, character.id, hover);
        tick(system, 5);
        expect(body.position[1]).toBe(RESTING_Y + 1);

        characterSystem.setIntent(system, character.id, walkIntent([0, 0, 0], 0));
        tick(system, 120);

        expect(character.ground.state).toBe(GroundState.GROUNDED);
        expect(character.jump.phase).toBe(JumpPhase.GROUNDED);
        expect(body.position[1]).toBeCloseTo(RESTING_Y, 6);
    });
});

describe('characterSystem - failures', () => {
    test('a missing body skips the tick and warns once', () => {
        const { world, backend } = createTestWorld();
        const { logger, warnings } = createRecordingLogger();
        const system = characterSystem.create(backend, { logger });
        const body = addTestBody(world);
        const other = addTestBody(world, [3, RESTING_Y, 0]);
        const character = addTestCharacter(system, body.id);
        const otherCharacter = addTestCharacter(system, other.id);
        characterSystem.setIntent(system, otherCharacter.id, walkIntent([1, 0, 0], 5));

        boxWorld.removeBody(world, body.id);
        tick(system, 3);

        expect(character.lastStatus).toBe(StepStatus.SKIPPED_BODY_NOT_FOUND);
        expect(character.lastError?.kind).toBe(ControllerErrorKind.BODY_NOT_FOUND);
        expect(character.lastError?.bodyRef).toBe(body.id);
        expect(character.lastError?.characterId).toBe(character.id);
        expect(character.ground.state).toBe(GroundState.AIRBORNE);
        expect(warnings).toHaveLength(1);

        expect(otherCharacter.lastStatus).toBe(StepStatus.OK);
        expect(other.position[0]).toBeGreaterThan(3);
    });

    test('an exception affects only its own character', () => {
        const { world, backend } = createTestWorld();
        const bad = addTestBody(world);
        const good = addTestBody(world, [3, RESTING_Y, 0]);
        const throwing: PhysicsBackend = {
            ...backend,
            castShape: (out, ref, shape, origin, direction, maxDistance) => {
                if (ref === bad.id) {
                    throw new Error('test failure');
                }
                return backend.castShape(out, ref, shape, origin, direction, maxDistance);
            },
        };
        const { logger, errors } = createRecordingLogger();
        const system = characterSystem.create(throwing, { logger });
        const badCharacter = addTestCharacter(system, bad.id);
        const goodCharacter = addTestCharacter(system, good.id);
        characterSystem.setIntent(system, badCharacter.id, walkIntent([1, 0, 0], 5, true));
        characterSystem.setIntent(system, goodCharacter.id, walkIntent([1, 0, 0], 5));

        tick(system, 5);

        expect(badCharacter.lastStatus).toBe(StepStatus.SKIPPED_QUERY_FAILED);
        expect(badCharacter.lastError?.kind).toBe(ControllerErrorKind.QUERY_FAILED);
        expect(badCharacter.lastError?.message).toBe(`unexpected failure for body ${bad.id}: test failure`);
        expect(badCharacter.intent.jump).toBe(false);
        expect(bad.position[0]).toBe(0);
        expect(errors).toHaveLength(5);
        expect(errors[0]).toBe(`character ${badCharacter.id}: update failed`);

        expect(goodCharacter.lastStatus).toBe(StepStatus.OK);
        expect(good.position[0]).toBeGreaterThan(3);
    });

    test('recovers once the backend answers again', () => {
        const { world, backend } = createTestWorld();
        const body = addTestBody(world);
        let broken = true;
        const flaky: PhysicsBackend = {
            ...backend,
            getPosition: (out, ref) => (broken ? backend.getPosition(out, -1) : backend.getPosition(out, ref)),
        };
        const system = createTestSystem(flaky);
        const character = addTestCharacter(system, body.id);

        tick(system, 1);
        expect(character.lastStatus).toBe(StepStatus.SKIPPED_BODY_NOT_FOUND);

        broken = false;
        tick(system, 1);
        expect(character.lastStatus).toBe(StepStatus.OK);
        expect(character.lastError).toBeUndefined();
        expect(character.ground.state).toBe(GroundState.GROUNDED);
    });
});
