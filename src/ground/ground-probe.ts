import { type Vec3, vec3 } from 'mathcat';
import { createShapeCastHit, type PhysicsBackend, QueryStatus } from '../backend/backend';
import type { ControlledBody } from '../body';
import type { ControllerSettings } from '../settings';
import { type GroundInfo, GroundState, resetGroundInfo } from './ground-info';

export const UP: Vec3 = [0, 1, 0];
const DOWN: Vec3 = [0, -1, 0];

/**
 * Checks if a ground normal is too steep to walk on.
 * A flat surface has dot(normal, up) = 1, a vertical wall has dot = 0.
 */
export function isSlopeTooSteep(normal: Vec3, maxSlopeAngle: number): boolean {
    return vec3.dot(normal, UP) < Math.cos(maxSlopeAngle);
}

/** angle between a normal and up, in radians */
export function getSlopeAngle(normal: Vec3): number {
    const dot = Math.min(1, Math.max(-1, vec3.dot(normal, UP)));
    return Math.acos(dot);
}

/**
 * Classifies a probe hit.
 * @param verticalVelocity the controller's current vertical speed, positive up
 */
export function classifyGround(
    normal: Vec3,
    distance: number,
    verticalVelocity: number,
    settings: ControllerSettings,
): GroundState {
    if (isSlopeTooSteep(normal, settings.maxSlopeAngle)) {
        return GroundState.SLOPED;
    }
    if (distance <= settings.skinWidth && verticalVelocity <= settings.groundedMaxUpwardSpeed) {
        return GroundState.GROUNDED;
    }
    return GroundState.AIRBORNE;
}

const _probeGround_origin = /* @__PURE__ */ vec3.create();
const _probeGround_hit = /* @__PURE__ */ createShapeCastHit();

/**
 * Casts the body's probe shape straight down from the body centre and classifies what it finds.
 *
 * BODY_NOT_FOUND and QUERY_FAILED are returned without touching `out`.
 * NO_HIT is reported as OK with an AIRBORNE ground.
 */
export function probeGround(
    out: GroundInfo,
    backend: PhysicsBackend,
    body: ControlledBody,
    settings: ControllerSettings,
    verticalVelocity: number,
): QueryStatus {
    const positionStatus = backend.getPosition(_probeGround_origin, body.ref);
    if (positionStatus !== QueryStatus.OK) {
        return positionStatus;
    }

    const status = backend.castShape(
        _probeGround_hit,
        body.ref,
        body.shape,
        _probeGround_origin,
        DOWN,
        settings.groundProbeDistance,
    );

    if (status === QueryStatus.NO_HIT) {
        resetGroundInfo(out);
        return QueryStatus.OK;
    }
    if (status !== QueryStatus.OK) {
        return status;
    }

    const hit = _probeGround_hit;
    out.snapped = false;
    vec3.normalize(out.normal, hit.normal);
    vec3.copy(out.point, hit.point);
    out.distance = Math.max(0, hit.distance);
    out.angle = getSlopeAngle(out.normal);
    out.state = classifyGround(out.normal, out.distance, verticalVelocity, settings);

    return QueryStatus.OK;
}

/**
 * Whether a character should be moved down onto the ground found by this tick's probe: it stood on walkable
 * ground last tick, is not moving up, and the walkable ground is now just out of skin range.
 *
 * @param wasGrounded the character was grounded before this tick
 */
export function canSnapToGround(
    ground: GroundInfo,
    wasGrounded: boolean,
    verticalVelocity: number,
    settings: ControllerSettings,
): boolean {
    return (
        wasGrounded &&
        verticalVelocity <= 0 &&
        ground.state === GroundState.AIRBORNE &&
        Number.isFinite(ground.distance) &&
        ground.distance <= settings.groundSnapDistance &&
        !isSlopeTooSteep(ground.normal, settings.maxSlopeAngle)
    );
}

const _snapToGround_motion = /* @__PURE__ */ vec3.create();
const _snapToGround_achieved = /* @__PURE__ */ vec3.create();

/**
 * Moves the body down by the probed ground distance and re-classifies the ground.
 * `ground` must hold this tick's probe result.
 */
export function snapToGround(
    ground: GroundInfo,
    backend: PhysicsBackend,
    body: ControlledBody,
    settings: ControllerSettings,
    verticalVelocity: number,
): QueryStatus {
    vec3.set(_snapToGround_motion, 0, -ground.distance, 0);
    const status = backend.moveKinematic(_snapToGround_achieved, body.ref, _snapToGround_motion);
    if (status !== QueryStatus.OK) {
        return status;
    }

    ground.distance = Math.max(0, ground.distance + _snapToGround_achieved[1]);
    ground.state = classifyGround(ground.normal, ground.distance, verticalVelocity, settings);
    ground.snapped = true;
    return QueryStatus.OK;
}
