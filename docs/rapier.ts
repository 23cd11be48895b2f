import RAPIER from '@dimforge/rapier3d-compat';
import { characterSystem, ControlMode, ProbeShapeType, rapierBackend, StepStatus } from '../src';

/* SNIPPET_START: rapier */
await RAPIER.init();

const world = new RAPIER.World({ x: 0, y: -9.81, z: 0 });

const ground = world.createRigidBody(RAPIER.RigidBodyDesc.fixed().setTranslation(0, -0.5, 0));
world.createCollider(RAPIER.ColliderDesc.cuboid(20, 0.5, 20), ground);

// KINEMATIC mode drives a kinematic position-based body
const player = world.createRigidBody(RAPIER.RigidBodyDesc.kinematicPositionBased().setTranslation(0, 0.81, 0));
world.createCollider(RAPIER.ColliderDesc.capsule(0.5, 0.3), player);

// VELOCITY, FORCE and IMPULSE modes drive a dynamic body. the controller integrates gravity itself,
// so turn the engine's gravity off for it and lock its rotations
const npc = world.createRigidBody(
    RAPIER.RigidBodyDesc.dynamic().setTranslation(4, 0.81, 0).setGravityScale(0).lockRotations(),
);
world.createCollider(RAPIER.ColliderDesc.capsule(0.5, 0.3), npc);

world.step();

const system = characterSystem.create(rapierBackend.createBackend(world));

const shape = { type: ProbeShapeType.CAPSULE, halfHeight: 0.5, radius: 0.3 };
characterSystem.add(system, { ref: player.handle, shape, mass: 70 });
const npcCharacter = characterSystem.add(system, { ref: npc.handle, shape, mass: 70 }, { mode: ControlMode.VELOCITY });

const dt = 1 / 60;
world.timestep = dt;

for (let i = 0; i < 60; i++) {
    // the controller runs before the physics step, the engine resolves the motion
    characterSystem.updateAll(system, dt);
    world.step();
}

if (npcCharacter.lastStatus !== StepStatus.OK) {
    console.warn('npc skipped its last tick', npcCharacter.lastError);
}
/* SNIPPET_END: rapier */
