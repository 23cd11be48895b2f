import {
    addBroadphaseLayer,
    addObjectLayer,
    box,
    capsule,
    createWorld,
    createWorldSettings,
    enableCollision,
    MotionType,
    registerAllShapes,
    rigidBody,
    updateWorld,
} from 'crashcat';
import {
    characterSystem,
    ControlMode,
    crashcatBackend,
    createInputMapping,
    createInputState,
    createMovementIntent,
    fixedStep,
    look,
    ProbeShapeType,
    toIntent,
} from '../src';

/* SNIPPET_START: world */
registerAllShapes();

const worldSettings = createWorldSettings();

const BROADPHASE_LAYER_MOVING = addBroadphaseLayer(worldSettings);
const BROADPHASE_LAYER_NOT_MOVING = addBroadphaseLayer(worldSettings);

const OBJECT_LAYER_MOVING = addObjectLayer(worldSettings, BROADPHASE_LAYER_MOVING);
const OBJECT_LAYER_NOT_MOVING = addObjectLayer(worldSettings, BROADPHASE_LAYER_NOT_MOVING);

enableCollision(worldSettings, OBJECT_LAYER_MOVING, OBJECT_LAYER_MOVING);
enableCollision(worldSettings, OBJECT_LAYER_MOVING, OBJECT_LAYER_NOT_MOVING);

const world = createWorld(worldSettings);

// a floor whose top is at y = 0, and a low step to walk onto
rigidBody.create(world, {
    shape: box.create({ halfExtents: [20, 0.5, 20] }),
    objectLayer: OBJECT_LAYER_NOT_MOVING,
    motionType: MotionType.STATIC,
    position: [0, -0.5, 0],
});
rigidBody.create(world, {
    shape: box.create({ halfExtents: [2, 0.1, 2] }),
    objectLayer: OBJECT_LAYER_NOT_MOVING,
    motionType: MotionType.STATIC,
    position: [4, 0.1, 0],
});

// the body the character drives. the controller never creates or removes bodies, the host owns them
const body = rigidBody.create(world, {
    shape: capsule.create({ halfHeightOfCylinder: 0.5, radius: 0.3 }),
    objectLayer: OBJECT_LAYER_MOVING,
    motionType: MotionType.KINEMATIC,
    position: [0, 0.81, 0],
});

const backend = crashcatBackend.createBackend(world);
/* SNIPPET_END: world */

/* SNIPPET_START: character */
// settings passed here are the defaults for every character in the system
const system = characterSystem.create(backend, {
    settings: { mode: ControlMode.KINEMATIC, maxJumps: 2 },
});

// per-character settings are merged over the system defaults
const character = characterSystem.add(
    system,
    { ref: body.id, shape: { type: ProbeShapeType.CAPSULE, halfHeight: 0.5, radius: 0.3 }, mass: 70 },
    { jumpVelocity: 7 },
);
/* SNIPPET_END: character */

/* SNIPPET_START: loop */
const playerLook = look.create();
const mapping = createInputMapping();
const input = createInputState();
const intent = createMovementIntent();

const loop = fixedStep.create();
let lastTime = performance.now();

function frame() {
    const currentTime = performance.now();
    const frameTime = (currentTime - lastTime) / 1000;
    lastTime = currentTime;

    // ... sample input devices into `input`, pointer movement into look.applyDelta ...
    input.forward = true;

    characterSystem.setIntent(system, character.id, toIntent(intent, mapping, input, playerLook));

    fixedStep.run(loop, frameTime, (dt) => {
        // the controller runs before the physics step
        characterSystem.updateAll(system, dt);
        updateWorld(world, undefined, dt);
    });

    // ... render, interpolating with loop.alpha ...
}

setInterval(frame, 1000 / 60);
/* SNIPPET_END: loop */
