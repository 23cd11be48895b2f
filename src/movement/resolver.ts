import { type Vec3, vec3 } from 'mathcat';
import { assertNever } from '../errors';
import { type GroundInfo, GroundState } from '../ground/ground-info';
import type { MovementIntent } from '../input/intent';
import { type JumpState, JumpPhase } from '../jump/jump-state';
import { ControlMode, type ControllerSettings } from '../settings';
import { type MovementOutput, resetMovementOutput } from './output';
import { type StepProbe, StepResult } from './step-up';

const EPSILON = 1e-6;

/** everything the resolver reads for one tick */
export type ResolveInput = {
    intent: MovementIntent;
    ground: GroundInfo;
    jump: JumpState;
    step: StepProbe;
    /** current body velocity, used for momentum and FORCE mode */
    currentVelocity: Vec3;
    settings: ControllerSettings;
    /** body mass, kg */
    mass: number;
    /** tick length, seconds */
    dt: number;
};

/** target velocity from the intent, sprint and crouch applied. Horizontal unless flying */
export function getTargetVelocity(out: Vec3, intent: MovementIntent, settings: ControllerSettings): Vec3 {
    vec3.set(out, intent.direction[0], intent.fly ? intent.direction[1] : 0, intent.direction[2]);
    const length = vec3.length(out);
    const speed = Math.max(0, intent.speed);
    if (length < EPSILON || speed === 0) {
        vec3.set(out, 0, 0, 0);
        return out;
    }

    let scale = speed / length;
    if (intent.sprint) scale *= settings.sprintSpeedMultiplier;
    if (intent.crouch) scale *= settings.crouchSpeedMultiplier;
    vec3.scale(out, out, scale);
    return out;
}

const _moveTowards_delta = /* @__PURE__ */ vec3.create();

/** moves `current` toward `target` by at most `maxDelta`, landing on it exactly */
export function moveTowards(out: Vec3, current: Vec3, target: Vec3, maxDelta: number): Vec3 {
    vec3.subtract(_moveTowards_delta, target, current);
    const distance = vec3.length(_moveTowards_delta);
    if (distance <= maxDelta || distance < EPSILON) {
        vec3.copy(out, target);
        return out;
    }
    vec3.scaleAndAdd(out, current, _moveTowards_delta, maxDelta / distance);
    return out;
}

const _airAccelerate_direction = /* @__PURE__ */ vec3.create();

/**
 * Air control: keeps momentum and adds at most `maxDelta` along the target direction
 * until the speed along it reaches the target speed.
 */
export function airAccelerate(out: Vec3, current: Vec3, target: Vec3, maxDelta: number): Vec3 {
    vec3.copy(out, current);
    const targetSpeed = vec3.length(target);
    if (targetSpeed < EPSILON) {
        return out;
    }
    vec3.scale(_airAccelerate_direction, target, 1 / targetSpeed);
    const currentSpeed = vec3.dot(current, _airAccelerate_direction);
    const addSpeed = targetSpeed - currentSpeed;
    if (addSpeed <= 0) {
        return out;
    }
    vec3.scaleAndAdd(out, out, _airAccelerate_direction, Math.min(maxDelta, addSpeed));
    return out;
}

const _slide_downslope = /* @__PURE__ */ vec3.create();
const _slide_direction = /* @__PURE__ */ vec3.create();

/** downslope unit direction on the plane with the given normal, zero on flat ground */
export function getDownslope(out: Vec3, normal: Vec3): Vec3 {
    // -up projected on the plane
    vec3.scale(out, normal, normal[1]);
    out[1] -= 1;
    const length = vec3.length(out);
    if (length < EPSILON) {
        vec3.set(out, 0, 0, 0);
        return out;
    }
    vec3.scale(out, out, 1 / length);
    return out;
}

/**
 * Slope slide: projects `velocity` onto the slope plane, turns it downslope by `blend` keeping its speed,
 * then removes what is left of any uphill component.
 */
export function slideOnSlope(out: Vec3, velocity: Vec3, normal: Vec3, blend: number): Vec3 {
    vec3.scaleAndAdd(out, velocity, normal, -vec3.dot(velocity, normal));

    const downslope = getDownslope(_slide_downslope, normal);
    const speed = vec3.length(out);
    if (speed > EPSILON && blend > 0) {
        vec3.scale(_slide_direction, out, (1 - blend) / speed);
        vec3.scaleAndAdd(_slide_direction, _slide_direction, downslope, blend);
        const length = vec3.length(_slide_direction);
        if (length > EPSILON) {
            vec3.scale(out, _slide_direction, speed / length);
        } else {
            vec3.scale(out, downslope, speed);
        }
    }

    const along = vec3.dot(out, downslope);
    if (along < 0) {
        vec3.scaleAndAdd(out, out, downslope, -along);
    }
    return out;
}

const _resolve_target = /* @__PURE__ */ vec3.create();
const _resolve_horizontal = /* @__PURE__ */ vec3.create();
const _resolve_wallNormal = /* @__PURE__ */ vec3.create();

/**
 * Resolves intent and state into this tick's movement output.
 *
 * In order of precedence:
 * - flying moves the full velocity toward the target at groundAcceleration, ignoring ground and gravity
 * - a step ahead is climbed with the grounded rules, a wall ahead blocks horizontal motion into it
 * - too steep ground slides the character down and never lets it climb
 * - on the ground, horizontal velocity approaches the target at groundAcceleration with a small downward stick
 * - otherwise air control keeps momentum, vertical velocity comes from the jump state
 */
export function resolveMovement(out: MovementOutput, input: ResolveInput): MovementOutput {
    const { intent, ground, jump, step, currentVelocity, settings, mass, dt } = input;

    resetMovementOutput(out, settings.mode);

    const target = getTargetVelocity(_resolve_target, intent, settings);
    vec3.set(_resolve_horizontal, currentVelocity[0], 0, currentVelocity[2]);

    const launching = jump.jumpedThisTick;
    const stepping = step.result === StepResult.STEP && !launching;
    const grounded = ground.state === GroundState.GROUNDED && jump.phase === JumpPhase.GROUNDED && !launching;

    if (intent.fly) {
        moveTowards(out.velocity, currentVelocity, target, settings.groundAcceleration * dt);
    } else if (stepping || grounded) {
        moveTowards(out.velocity, _resolve_horizontal, target, settings.groundAcceleration * dt);
        out.velocity[1] = -settings.groundStickSpeed;
        if (stepping) {
            out.stepUp = step.height;
        }
    } else if (ground.state === GroundState.SLOPED && !launching) {
        airAccelerate(out.velocity, _resolve_horizontal, target, settings.airAcceleration * dt);
        out.velocity[1] = jump.verticalVelocity;
        const blend = Math.min(1, Math.max(0, settings.slopeSlideFactor * (ground.angle - settings.maxSlopeAngle)));
        slideOnSlope(out.velocity, out.velocity, ground.normal, blend);
    } else {
        airAccelerate(out.velocity, _resolve_horizontal, target, settings.airAcceleration * dt);
        out.velocity[1] = jump.verticalVelocity;
    }

    if (step.result === StepResult.WALL) {
        vec3.set(_resolve_wallNormal, step.normal[0], 0, step.normal[2]);
        const length = vec3.length(_resolve_wallNormal);
        if (length > EPSILON) {
            vec3.scale(_resolve_wallNormal, _resolve_wallNormal, 1 / length);
            const into = vec3.dot(out.velocity, _resolve_wallNormal);
            if (into < 0) {
                vec3.scaleAndAdd(out.velocity, out.velocity, _resolve_wallNormal, -into);
            }
            out.blocked = true;
        }
    }

    switch (out.mode) {
        case ControlMode.KINEMATIC:
            vec3.scale(out.vector, out.velocity, dt);
            break;
        case ControlMode.VELOCITY:
            vec3.copy(out.vector, out.velocity);
            break;
        case ControlMode.FORCE:
            vec3.subtract(out.vector, out.velocity, currentVelocity);
            vec3.scale(out.vector, out.vector, mass / dt);
            break;
        case ControlMode.IMPULSE:
            vec3.subtract(out.vector, out.velocity, currentVelocity);
            vec3.scale(out.vector, out.vector, mass);
            break;
        default:
            assertNever(out.mode, 'unknown control mode');
    }

    return out;
}
