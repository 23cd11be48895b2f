import type { Vec3 } from 'mathcat';
import {
    type Character,
    type CharacterSystem,
    characterSystem,
    type ControllerSettings,
    createMovementIntent,
    type MovementIntent,
    type PhysicsBackend,
    type ProbeShape,
    ProbeShapeType,
    silentLogger,
} from '../src';
import * as boxWorld from './box-world';
import type { BoxWorld } from './box-world';

export const DT = 1 / 60;

/** capsule with a total half height of 0.8 and radius 0.3 */
export const TEST_SHAPE: ProbeShape = { type: ProbeShapeType.CAPSULE, halfHeight: 0.5, radius: 0.3 };
export const TEST_HALF_HEIGHT = 0.8;

/** a body resting on the ground keeps this gap */
export const CONTACT_OFFSET = 1e-3;

/** y of a test body resting on the floor */
export const RESTING_Y = TEST_HALF_HEIGHT + CONTACT_OFFSET;

/** a box world with a 100x100 floor whose top is at y = 0 */
export const createTestWorld = () => {
    const world = boxWorld.create();
    boxWorld.addBox(world, [-50, -1, -50], [50, 0, 50]);
    const backend = boxWorld.createBackend(world);

    return { world, backend };
};

export const addTestBody = (world: BoxWorld, position: Vec3 = [0, RESTING_Y, 0]) => {
    return boxWorld.addBody(world, { shape: TEST_SHAPE, position });
};

export const createTestSystem = (backend: PhysicsBackend, settings: Partial<ControllerSettings> = {}): CharacterSystem => {
    return characterSystem.create(backend, { logger: silentLogger, settings });
};

export const addTestCharacter = (system: CharacterSystem, ref: number, settings: Partial<ControllerSettings> = {}): Character => {
    return characterSystem.add(system, { ref, shape: TEST_SHAPE, mass: 70 }, settings);
};

export const walkIntent = (direction: Vec3, speed: number, jump = false): MovementIntent => {
    const intent = createMovementIntent();
    intent.direction[0] = direction[0];
    intent.direction[1] = direction[1];
    intent.direction[2] = direction[2];
    intent.speed = speed;
    intent.jump = jump;
    return intent;
};

export const tick = (system: CharacterSystem, count: number, dt = DT) => {
    for (let i = 0; i < count; i++) {
        characterSystem.updateAll(system, dt);
    }
};
