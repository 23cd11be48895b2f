import RAPIER from '@dimforge/rapier3d-compat';
import type { Vec3 } from 'mathcat';
import { beforeAll, describe, expect, test } from 'vitest';
import {
    characterSystem,
    ControlMode,
    createShapeCastHit,
    GroundState,
    JumpPhase,
    ProbeShapeType,
    QueryStatus,
    rapierBackend,
    StepStatus,
} from '../../src';
import { addTestCharacter, createTestSystem, DT, TEST_SHAPE, walkIntent } from '../helpers';

const DOWN: Vec3 = [0, -1, 0];

const RAMP_ANGLE = Math.PI / 6;

/**
 * A 30° ramp rising toward +x: a 12 x 1 x 10 cuboid centered on the origin, rotated about z.
 * Its top surface is y = 0.433 + tan(30°) * (x + 0.25), the capsule rests 0.005 above it at x = 2.
 */
const createRapierRampWorld = () => {
    const world = new RAPIER.World({ x: 0, y: -9.81, z: 0 });

    const ramp = world.createRigidBody(
        RAPIER.RigidBodyDesc.fixed().setRotation({ x: 0, y: 0, z: Math.sin(RAMP_ANGLE / 2), w: Math.cos(RAMP_ANGLE / 2) }),
    );
    world.createCollider(RAPIER.ColliderDesc.cuboid(6, 0.5, 5), ramp);

    const surfaceY = 0.5 * Math.cos(RAMP_ANGLE) + Math.tan(RAMP_ANGLE) * (2 + 0.5 * Math.sin(RAMP_ANGLE));
    const restingY = surfaceY + 0.5 + TEST_SHAPE.radius / Math.cos(RAMP_ANGLE) + 0.005;

    const body = world.createRigidBody(RAPIER.RigidBodyDesc.kinematicPositionBased().setTranslation(2, restingY, 0));
    world.createCollider(RAPIER.ColliderDesc.capsule(TEST_SHAPE.halfHeight, TEST_SHAPE.radius), body);

    world.step();

    const backend = rapierBackend.createBackend(world);

    return { world, body, backend, restingY };
};

/** a rapier world with a floor whose top is at y = 0 and a kinematic capsule 0.01 above it */
const createRapierTestWorld = () => {
    const world = new RAPIER.World({ x: 0, y: -9.81, z: 0 });

    const floor = world.createRigidBody(RAPIER.RigidBodyDesc.fixed().setTranslation(0, -0.5, 0));
    world.createCollider(RAPIER.ColliderDesc.cuboid(50, 0.5, 50), floor);

    const body = world.createRigidBody(RAPIER.RigidBodyDesc.kinematicPositionBased().setTranslation(0, 0.81, 0));
    world.createCollider(RAPIER.ColliderDesc.capsule(TEST_SHAPE.halfHeight, TEST_SHAPE.radius), body);

    // scene queries see the world as of the last step
    world.step();

    const backend = rapierBackend.createBackend(world);

    return { world, body, backend };
};

beforeAll(async () => {
    await RAPIER.init();
});

describe('rapier backend', () => {
    test('castShape hits the floor and ignores the casting body', () => {
        const { body, backend } = createRapierTestWorld();
        const hit = createShapeCastHit();

        const status = backend.castShape(hit, body.handle, TEST_SHAPE, [0, 0.81, 0], DOWN, 1);

        expect(status).toBe(QueryStatus.OK);
        expect(hit.distance).toBeCloseTo(0.01, 2);
        expect(hit.normal[0]).toBeCloseTo(0, 3);
        expect(hit.normal[1]).toBeCloseTo(1, 3);
        expect(hit.normal[2]).toBeCloseTo(0, 3);
        expect(hit.point[1]).toBeCloseTo(0, 2);
    });

    test('castShape reports NO_HIT and QUERY_FAILED', () => {
        const { body, backend } = createRapierTestWorld();
        const hit = createShapeCastHit();

        expect(backend.castShape(hit, body.handle, TEST_SHAPE, [0, 0.81, 0], [0, 1, 0], 10)).toBe(QueryStatus.NO_HIT);
        expect(backend.castShape(hit, body.handle, TEST_SHAPE, [0, 0.81, 0], [0, 0, 0], 1)).toBe(QueryStatus.QUERY_FAILED);
    });

    test('castRay hits the floor', () => {
        const { body, backend } = createRapierTestWorld();
        const hit = createShapeCastHit();

        const status = backend.castRay(hit, body.handle, [0, 0.5, 0], DOWN, 2);

        expect(status).toBe(QueryStatus.OK);
        expect(hit.distance).toBeCloseTo(0.5, 3);
        expect(hit.normal[1]).toBeCloseTo(1, 3);
        expect(hit.point[1]).toBeCloseTo(0, 3);
    });

    test('castShape reports world-space normals and points on a rotated collider', () => {
        const { body, backend, restingY } = createRapierRampWorld();
        const hit = createShapeCastHit();

        const status = backend.castShape(hit, body.handle, TEST_SHAPE, [2, restingY, 0], DOWN, 1);

        expect(status).toBe(QueryStatus.OK);
        expect(hit.distance).toBeCloseTo(0.005, 2);
        expect(hit.normal[0]).toBeCloseTo(-Math.sin(RAMP_ANGLE), 3);
        expect(hit.normal[1]).toBeCloseTo(Math.cos(RAMP_ANGLE), 3);
        expect(hit.normal[2]).toBeCloseTo(0, 3);
        // the contact lies on the ramp surface, below and uphill of the capsule's lower sphere
        const surfaceAtHit = 0.5 * Math.cos(RAMP_ANGLE) + Math.tan(RAMP_ANGLE) * (hit.point[0] + 0.5 * Math.sin(RAMP_ANGLE));
        expect(hit.point[1]).toBeCloseTo(surfaceAtHit, 2);
        expect(hit.point[0]).toBeCloseTo(2 + TEST_SHAPE.radius * Math.sin(RAMP_ANGLE), 2);
    });

    test('a character standing on a rotated ramp is grounded with the ramp angle', () => {
        const { world, body, backend } = createRapierRampWorld();
        const system = createTestSystem(backend);
        const character = addTestCharacter(system, body.handle);

        characterSystem.updateAll(system, DT);
        world.step();

        expect(character.lastStatus).toBe(StepStatus.OK);
        expect(character.ground.state).toBe(GroundState.GROUNDED);
        expect(character.ground.angle).toBeCloseTo(RAMP_ANGLE, 3);
    });

    test('chained moves within one step compose', () => {
        const { world, body, backend } = createRapierTestWorld();
        const achieved: Vec3 = [0, 0, 0];
        const position: Vec3 = [0, 0, 0];

        expect(backend.moveKinematic(achieved, body.handle, [0, 0.5, 0])).toBe(QueryStatus.OK);
        expect(backend.moveKinematic(achieved, body.handle, [1, 0, 0])).toBe(QueryStatus.OK);

        expect(backend.getPosition(position, body.handle)).toBe(QueryStatus.OK);
        expect(position[0]).toBeCloseTo(1, 3);
        expect(position[1]).toBeCloseTo(1.31, 3);

        world.step();

        expect(body.translation().x).toBeCloseTo(1, 3);
        expect(body.translation().y).toBeCloseTo(1.31, 3);
    });

    test('moveKinematic stops at obstacles and slides along them', () => {
        const { world, body, backend } = createRapierTestWorld();
        const wall = world.createRigidBody(RAPIER.RigidBodyDesc.fixed().setTranslation(1.5, 1, 0));
        world.createCollider(RAPIER.ColliderDesc.cuboid(0.5, 1, 5), wall);
        world.step();
        const achieved: Vec3 = [0, 0, 0];

        expect(backend.moveKinematic(achieved, body.handle, [2, 0, 1])).toBe(QueryStatus.OK);

        // the capsule's side stops at the wall face x = 1
        expect(achieved[0]).toBeCloseTo(0.7, 2);
        expect(achieved[1]).toBeCloseTo(0, 3);
        expect(achieved[2]).toBeCloseTo(1, 2);
    });

    test('removed bodies are BODY_NOT_FOUND', () => {
        const { world, body, backend } = createRapierTestWorld();
        const handle = body.handle;
        world.removeRigidBody(body);
        world.step();

        const position: Vec3 = [0, 0, 0];
        expect(backend.getPosition(position, handle)).toBe(QueryStatus.BODY_NOT_FOUND);
        expect(backend.castShape(createShapeCastHit(), handle, TEST_SHAPE, [0, 1, 0], DOWN, 1)).toBe(
            QueryStatus.BODY_NOT_FOUND,
        );
        expect(backend.moveKinematic(position, handle, [1, 0, 0])).toBe(QueryStatus.BODY_NOT_FOUND);
    });

    test('moveKinematic moves the body on the next step', () => {
        const { world, body, backend } = createRapierTestWorld();
        const achieved: Vec3 = [0, 0, 0];

        expect(backend.moveKinematic(achieved, body.handle, [1, 0, 0])).toBe(QueryStatus.OK);
        expect(achieved[0]).toBeCloseTo(1, 3);

        world.step();

        const position: Vec3 = [0, 0, 0];
        expect(backend.getPosition(position, body.handle)).toBe(QueryStatus.OK);
        expect(position[0]).toBeCloseTo(1, 3);
        expect(position[1]).toBeCloseTo(0.81, 3);
    });

    test('applyImpulse changes a dynamic body velocity by impulse / mass', () => {
        const { world, backend } = createRapierTestWorld();
        const dynamic = world.createRigidBody(RAPIER.RigidBodyDesc.dynamic().setTranslation(5, 2, 0).setGravityScale(0));
        world.createCollider(RAPIER.ColliderDesc.ball(0.5).setMass(2), dynamic);
        // mass properties are applied by a step
        world.step();
        const velocity: Vec3 = [0, 0, 0];

        expect(backend.applyImpulse(dynamic.handle, [4, 0, 0])).toBe(QueryStatus.OK);
        expect(backend.getLinearVelocity(velocity, dynamic.handle)).toBe(QueryStatus.OK);
        expect(velocity[0]).toBeCloseTo(2, 5);
    });

    test('casts keep working with more probe shapes than the cache holds', () => {
        const world = new RAPIER.World({ x: 0, y: -9.81, z: 0 });
        const floor = world.createRigidBody(RAPIER.RigidBodyDesc.fixed().setTranslation(0, -0.5, 0));
        world.createCollider(RAPIER.ColliderDesc.cuboid(50, 0.5, 50), floor);
        const caster = world.createRigidBody(RAPIER.RigidBodyDesc.kinematicPositionBased().setTranslation(0, 3, 0));
        world.createCollider(RAPIER.ColliderDesc.ball(0.1), caster);
        world.step();
        const backend = rapierBackend.createBackend(world, { ...rapierBackend.createRapierBackendSettings(), shapeCacheSize: 2 });
        const hit = createShapeCastHit();

        for (const i of [1, 2, 3, 4, 5, 1, 3]) {
            const shape = { type: ProbeShapeType.CYLINDER, halfHeight: 0.1 * i, radius: 0.1 };
            expect(backend.castShape(hit, caster.handle, shape, [0, 3, 0], DOWN, 10)).toBe(QueryStatus.OK);
            expect(hit.distance).toBeCloseTo(3 - 0.1 * i, 2);
        }
    });

    test('velocity round trips', () => {
        const { world, backend } = createRapierTestWorld();
        const dynamic = world.createRigidBody(RAPIER.RigidBodyDesc.dynamic().setTranslation(5, 2, 0));
        world.createCollider(RAPIER.ColliderDesc.ball(0.5), dynamic);
        const velocity: Vec3 = [0, 0, 0];

        expect(backend.setLinearVelocity(dynamic.handle, [1, 2, 3])).toBe(QueryStatus.OK);
        expect(backend.getLinearVelocity(velocity, dynamic.handle)).toBe(QueryStatus.OK);
        expect(velocity[0]).toBeCloseTo(1, 5);
        expect(velocity[1]).toBeCloseTo(2, 5);
        expect(velocity[2]).toBeCloseTo(3, 5);
    });

    test('drives a walking character', () => {
        const { world, body, backend } = createRapierTestWorld();
        const system = createTestSystem(backend);
        const character = addTestCharacter(system, body.handle);
        characterSystem.setIntent(system, character.id, walkIntent([1, 0, 0], 5));

        for (let i = 0; i < 30; i++) {
            characterSystem.updateAll(system, DT);
            world.step();
        }

        expect(character.lastStatus).toBe(StepStatus.OK);
        expect(character.ground.state).toBe(GroundState.GROUNDED);
        expect(body.translation().x).toBeGreaterThan(1);
        expect(body.translation().y).toBeGreaterThan(0.79);
    });

    test('a walking character climbs a low step', () => {
        const { world, body, backend } = createRapierTestWorld();
        // top at y = 0.2, front face at x = 0.5
        const step = world.createRigidBody(RAPIER.RigidBodyDesc.fixed().setTranslation(10.25, 0.1, 0));
        world.createCollider(RAPIER.ColliderDesc.cuboid(9.75, 0.1, 5), step);
        world.step();
        const system = createTestSystem(backend);
        const character = addTestCharacter(system, body.handle);
        characterSystem.setIntent(system, character.id, walkIntent([1, 0, 0], 5));

        for (let i = 0; i < 120; i++) {
            characterSystem.updateAll(system, DT);
            world.step();
        }

        expect(character.lastStatus).toBe(StepStatus.OK);
        expect(body.translation().x).toBeGreaterThan(1.5);
        expect(body.translation().y).toBeGreaterThan(0.95);
        expect(body.translation().y).toBeLessThan(1.05);
        expect(character.ground.state).toBe(GroundState.GROUNDED);
    });

    test('walking down a ramp stays grounded and can jump', () => {
        const { world, body, backend } = createRapierRampWorld();
        const system = createTestSystem(backend);
        const character = addTestCharacter(system, body.handle);
        characterSystem.setIntent(system, character.id, walkIntent([-1, 0, 0], 5));

        const phases: JumpPhase[] = [];
        for (let i = 0; i < 30; i++) {
            characterSystem.updateAll(system, DT);
            world.step();
            phases.push(character.jump.phase);
        }

        expect(phases).toEqual(new Array(30).fill(JumpPhase.GROUNDED));
        expect(body.translation().x).toBeLessThan(0.5);

        characterSystem.setIntent(system, character.id, walkIntent([-1, 0, 0], 5, true));
        characterSystem.updateAll(system, DT);
        world.step();

        expect(character.jump.jumpedThisTick).toBe(true);
    });

    test('IMPULSE mode drives a dynamic body', () => {
        const { world, backend } = createRapierTestWorld();
        const dynamic = world.createRigidBody(
            RAPIER.RigidBodyDesc.dynamic().setTranslation(3, 0.81, 0).setGravityScale(0).lockRotations(),
        );
        world.createCollider(RAPIER.ColliderDesc.capsule(TEST_SHAPE.halfHeight, TEST_SHAPE.radius).setMass(70), dynamic);
        world.step();
        const system = createTestSystem(backend, { mode: ControlMode.IMPULSE });
        const character = addTestCharacter(system, dynamic.handle);
        characterSystem.setIntent(system, character.id, walkIntent([0, 0, 1], 5));

        characterSystem.updateAll(system, DT);

        expect(character.lastStatus).toBe(StepStatus.OK);
        expect(dynamic.linvel().z).toBeCloseTo(1, 3);
    });
});
