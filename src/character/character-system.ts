import { type Vec3, vec3 } from 'mathcat';
import { type BodyRef, createShapeCastHit, type PhysicsBackend, QueryStatus } from '../backend/backend';
import { type ControlledBody, validateControlledBody } from '../body';
import { assertNever, bodyNotFound, type ControllerError, queryFailed, toControllerError } from '../errors';
import { createGroundInfo, type GroundInfo, GroundState, resetGroundInfo } from '../ground/ground-info';
import { canSnapToGround, probeGround, snapToGround } from '../ground/ground-probe';
import { copyMovementIntent, createMovementIntent, type MovementIntent } from '../input/intent';
import { createJumpState, JumpPhase, type JumpState, setFlying, updateJumpState } from '../jump/jump-state';
import { consoleLogger, type Logger } from '../logger';
import { createMovementOutput, type MovementOutput } from '../movement/output';
import { getTargetVelocity, resolveMovement } from '../movement/resolver';
import { createStepProbe, probeStep, resetStepProbe, type StepProbe } from '../movement/step-up';
import {
    ControlMode,
    type ControllerSettings,
    createControllerSettings,
    mergeControllerSettings,
    validateControllerSettings,
} from '../settings';
import { allocateSlot, createSlots, getSlot, iterateSlots, releaseSlot, type Slots } from '../utils/packed-id';
import type { CharacterId } from './character-id';
import { INVALID_CHARACTER_ID } from './character-id';

/** outcome of one character tick */
export enum StepStatus {
    OK = 0,
    /** the body was missing, nothing was applied */
    SKIPPED_BODY_NOT_FOUND = 1,
    /** a position, velocity or ground query failed, nothing was applied */
    SKIPPED_QUERY_FAILED = 2,
}

/** a controlled character, owned by its character system */
export type Character = {
    /** character id, stale once removed */
    id: CharacterId;
    /** index in the character pool */
    index: number;
    /** sequence number for stale id detection */
    sequence: number;
    /** whether the character is pooled */
    pooled: boolean;

    /** body the character drives */
    body: ControlledBody;
    /** per-character tunables */
    settings: ControllerSettings;

    /** intent for the next tick, the jump press is cleared after each tick */
    intent: MovementIntent;
    /** ground classification from the last tick */
    ground: GroundInfo;
    /** jump and gravity state */
    jump: JumpState;
    /** step-up probe from the last tick */
    step: StepProbe;
    /** movement output from the last applied tick */
    output: MovementOutput;
    /**
     * Velocity carried to the next tick.
     * In KINEMATIC mode this is the achieved horizontal velocity plus the resolved vertical velocity,
     * otherwise the resolved velocity.
     */
    velocity: Vec3;

    lastStatus: StepStatus;
    /** error of the last failed tick, cleared by a successful one */
    lastError: ControllerError | undefined;
};

export type CharacterSystem = {
    backend: PhysicsBackend;
    logger: Logger;
    /** settings new characters start from */
    settings: ControllerSettings;
    characters: Slots<Character>;
};

export type CharacterSystemOptions = {
    /** @default console */
    logger?: Logger;
    /** defaults for new characters */
    settings?: Partial<ControllerSettings>;
};

/** creates a character system driving bodies through the given backend */
export function create(backend: PhysicsBackend, options: CharacterSystemOptions = {}): CharacterSystem {
    const settings = createControllerSettings(options.settings);
    validateControllerSettings(settings);

    return {
        backend,
        logger: options.logger ?? consoleLogger,
        settings,
        characters: createSlots(),
    };
}

function makeCharacter(body: ControlledBody, settings: ControllerSettings): Character {
    return {
        id: INVALID_CHARACTER_ID,
        index: -1,
        sequence: -1,
        pooled: true,
        body,
        settings,
        intent: createMovementIntent(),
        ground: createGroundInfo(),
        jump: createJumpState(settings),
        step: createStepProbe(),
        output: createMovementOutput(),
        velocity: vec3.create(),
        lastStatus: StepStatus.OK,
        lastError: undefined,
    };
}

function resetCharacter(character: Character, body: ControlledBody, settings: ControllerSettings): void {
    character.body = body;
    character.settings = settings;
    character.intent = createMovementIntent();
    character.ground = createGroundInfo();
    character.jump = createJumpState(settings);
    character.step = createStepProbe();
    character.output = createMovementOutput();
    character.velocity = vec3.create();
    character.lastStatus = StepStatus.OK;
    character.lastError = undefined;
}

/**
 * Adds a character for a body.
 * @throws ControllerError with kind INVALID_CONFIGURATION for impossible settings or body geometry
 */
export function add(system: CharacterSystem, body: ControlledBody, settings: Partial<ControllerSettings> = {}): Character {
    const resolved = mergeControllerSettings(system.settings, settings);
    validateControllerSettings(resolved);
    validateControlledBody(body);

    const ownedBody: ControlledBody = { ref: body.ref, shape: { ...body.shape }, mass: body.mass };

    const character = allocateSlot(system.characters, () => makeCharacter(ownedBody, resolved));
    // slots are reused, start from a clean state either way
    resetCharacter(character, ownedBody, resolved);

    return character;
}

/** removes a character, false if the id is stale or unknown. The body is left to the host. */
export function remove(system: CharacterSystem, id: CharacterId): boolean {
    const character = getSlot(system.characters, id);
    if (!character) {
        return false;
    }
    return releaseSlot(system.characters, character);
}

/** returns the character for a live id, undefined for stale or unknown ids */
export function get(system: CharacterSystem, id: CharacterId): Character | undefined {
    return getSlot(system.characters, id);
}

/** iterates live characters in pool order */
export function iterate(system: CharacterSystem): Generator<Character> {
    return iterateSlots(system.characters);
}

/** finds the character driving a body */
export function findByBody(system: CharacterSystem, ref: BodyRef): Character | undefined {
    for (const character of iterateSlots(system.characters)) {
        if (character.body.ref === ref) {
            return character;
        }
    }
    return undefined;
}

/** stores the intent for the next tick, false if the id is stale or unknown */
export function setIntent(system: CharacterSystem, id: CharacterId, intent: MovementIntent): boolean {
    const character = getSlot(system.characters, id);
    if (!character) {
        return false;
    }
    // a press survives until a tick consumes it
    const jump = character.intent.jump || intent.jump;
    copyMovementIntent(character.intent, intent);
    character.intent.jump = jump;
    return true;
}

/**
 * Changes a character's settings, keeping its state.
 * @returns false if the id is stale or unknown
 * @throws ControllerError with kind INVALID_CONFIGURATION, the old settings are kept
 */
export function setSettings(system: CharacterSystem, id: CharacterId, settings: Partial<ControllerSettings>): boolean {
    const character = getSlot(system.characters, id);
    if (!character) {
        return false;
    }
    const resolved = mergeControllerSettings(character.settings, settings);
    validateControllerSettings(resolved);
    character.settings = resolved;
    character.jump.jumpsRemaining = Math.min(character.jump.jumpsRemaining, resolved.maxJumps);
    return true;
}

function fail(system: CharacterSystem, character: Character, status: StepStatus, error: ControllerError): StepStatus {
    if (character.lastStatus !== status) {
        system.logger.warn(`character ${character.id}: ${error.message}, tick skipped`);
    }
    character.lastStatus = status;
    character.lastError = error;
    return status;
}

function failQuery(system: CharacterSystem, character: Character, status: QueryStatus, what: string): StepStatus {
    if (status === QueryStatus.BODY_NOT_FOUND) {
        return fail(system, character, StepStatus.SKIPPED_BODY_NOT_FOUND, bodyNotFound(character.body.ref, character.id));
    }
    return fail(system, character, StepStatus.SKIPPED_QUERY_FAILED, queryFailed(what, character.body.ref, character.id));
}

function assertTimeStep(dt: number): void {
    if (!Number.isFinite(dt) || dt <= 0) {
        throw new RangeError(`dt must be a finite number > 0, got ${dt}`);
    }
}

const UP: Vec3 = [0, 1, 0];
const DOWN: Vec3 = [0, -1, 0];

const _update_currentVelocity = /* @__PURE__ */ vec3.create();
const _update_target = /* @__PURE__ */ vec3.create();
const _update_direction = /* @__PURE__ */ vec3.create();
const _apply_achieved = /* @__PURE__ */ vec3.create();
const _apply_motion = /* @__PURE__ */ vec3.create();
const _apply_position = /* @__PURE__ */ vec3.create();
const _apply_hit = /* @__PURE__ */ createShapeCastHit();

function applyStepUp(system: CharacterSystem, character: Character, height: number): QueryStatus {
    vec3.scale(_apply_motion, UP, height);
    return system.backend.moveKinematic(_apply_achieved, character.body.ref, _apply_motion);
}

/** drops a lifted character by at most `maxDrop`, stopping on what the probe shape finds below */
function settleOnStep(system: CharacterSystem, character: Character, maxDrop: number): QueryStatus {
    const { backend } = system;
    const { body } = character;

    const positionStatus = backend.getPosition(_apply_position, body.ref);
    if (positionStatus !== QueryStatus.OK) return positionStatus;

    let drop = maxDrop;
    const castStatus = backend.castShape(_apply_hit, body.ref, body.shape, _apply_position, DOWN, maxDrop);
    if (castStatus === QueryStatus.OK) {
        drop = _apply_hit.distance;
    } else if (castStatus !== QueryStatus.NO_HIT) {
        return castStatus;
    }

    vec3.scale(_apply_motion, DOWN, drop);
    return backend.moveKinematic(_apply_achieved, body.ref, _apply_motion);
}

/**
 * Hands the resolved output to the backend.
 * A kinematic step goes up, across, then back down onto the step.
 */
function applyOutput(system: CharacterSystem, character: Character, dt: number): QueryStatus {
    const { backend } = system;
    const { output, body } = character;
    const ref = body.ref;

    if (output.mode === ControlMode.KINEMATIC) {
        let lifted = 0;
        if (output.stepUp > 0) {
            // clear the step top by the skin width, the down move settles onto it
            const status = applyStepUp(system, character, output.stepUp + character.settings.skinWidth);
            if (status !== QueryStatus.OK) return status;
            lifted = Math.max(0, _apply_achieved[1]);
        }

        vec3.copy(_apply_motion, output.vector);
        if (lifted > 0) _apply_motion[1] = 0;

        const status = backend.moveKinematic(_apply_achieved, ref, _apply_motion);
        if (status !== QueryStatus.OK) return status;

        vec3.scale(character.velocity, _apply_achieved, 1 / dt);
        character.velocity[1] = output.velocity[1];

        // head bump
        if (output.vector[1] > 0 && _apply_achieved[1] < output.vector[1] - 1e-4) {
            character.jump.verticalVelocity = 0;
            character.velocity[1] = 0;
        }

        if (lifted > 0) {
            return settleOnStep(system, character, lifted + Math.max(0, -output.vector[1]));
        }
        return QueryStatus.OK;
    }

    if (output.stepUp > 0) {
        const status = applyStepUp(system, character, output.stepUp);
        if (status !== QueryStatus.OK) return status;
    }

    vec3.copy(character.velocity, output.velocity);

    switch (output.mode) {
        case ControlMode.VELOCITY:
            return backend.setLinearVelocity(ref, output.vector);
        case ControlMode.FORCE:
            return backend.applyForce(ref, output.vector);
        case ControlMode.IMPULSE:
            return backend.applyImpulse(ref, output.vector);
        default:
            return assertNever(output.mode, 'unknown control mode');
    }
}

/**
 * Runs one tick for a character: ground probe and snap, jump and gravity update, step probe, resolve, apply.
 * Failures are recorded on the character as lastStatus and lastError.
 */
export function update(system: CharacterSystem, character: Character, dt: number): StepStatus {
    assertTimeStep(dt);

    const { backend } = system;
    const { settings, body, intent, jump } = character;

    try {
        /* current velocity */
        if (settings.mode === ControlMode.KINEMATIC) {
            vec3.copy(_update_currentVelocity, character.velocity);
        } else {
            const velocityStatus = backend.getLinearVelocity(_update_currentVelocity, body.ref);
            if (velocityStatus !== QueryStatus.OK) {
                return failQuery(system, character, velocityStatus, 'velocity');
            }
        }

        /* ground */
        const groundStatus = probeGround(character.ground, backend, body, settings, jump.verticalVelocity);
        if (groundStatus !== QueryStatus.OK) {
            resetGroundInfo(character.ground);
            return failQuery(system, character, groundStatus, 'ground');
        }

        if (intent.fly) {
            setFlying(jump, settings, dt);
        } else {
            /* snap */
            const wasGrounded = jump.phase === JumpPhase.GROUNDED;
            if (canSnapToGround(character.ground, wasGrounded, jump.verticalVelocity, settings)) {
                const snapStatus = snapToGround(character.ground, backend, body, settings, jump.verticalVelocity);
                if (snapStatus === QueryStatus.BODY_NOT_FOUND) {
                    return failQuery(system, character, snapStatus, 'snap');
                }
                if (snapStatus !== QueryStatus.OK) {
                    system.logger.warn(`character ${character.id}: snap query failed for body ${body.ref}, snap skipped`);
                }
            }

            /* jump and gravity */
            updateJumpState(jump, character.ground.state, intent.jump, settings, dt);
        }

        /* step */
        resetStepProbe(character.step);
        const supported =
            character.ground.state === GroundState.GROUNDED || character.ground.state === GroundState.SLOPED;
        if (supported && !intent.fly && !jump.jumpedThisTick) {
            getTargetVelocity(_update_target, intent, settings);
            const speed = vec3.length(_update_target);
            if (speed > 0) {
                vec3.scale(_update_direction, _update_target, 1 / speed);
                const stepStatus = probeStep(character.step, backend, body, settings, _update_direction, speed, dt);
                if (stepStatus === QueryStatus.BODY_NOT_FOUND) {
                    return failQuery(system, character, stepStatus, 'step');
                }
                if (stepStatus !== QueryStatus.OK) {
                    system.logger.warn(`character ${character.id}: step query failed for body ${body.ref}, step-up skipped`);
                }
            }
        }

        /* resolve */
        resolveMovement(character.output, {
            intent,
            ground: character.ground,
            jump,
            step: character.step,
            currentVelocity: _update_currentVelocity,
            settings,
            mass: body.mass,
            dt,
        });

        /* apply */
        const applyStatus = applyOutput(system, character, dt);
        if (applyStatus !== QueryStatus.OK) {
            return failQuery(system, character, applyStatus, 'move');
        }

        character.lastStatus = StepStatus.OK;
        character.lastError = undefined;
        return StepStatus.OK;
    } finally {
        intent.jump = false;
    }
}

/**
 * Updates every character. A failure, thrown or reported, affects only its own character.
 */
export function updateAll(system: CharacterSystem, dt: number): void {
    assertTimeStep(dt);

    for (const character of iterateSlots(system.characters)) {
        try {
            update(system, character, dt);
        } catch (error) {
            const controllerError = toControllerError(error, character.id, character.body.ref);
            character.lastStatus = StepStatus.SKIPPED_QUERY_FAILED;
            character.lastError = controllerError;
            system.logger.error(`character ${character.id}: update failed`, controllerError);
        }
    }
}
