import { type Vec3, vec3 } from 'mathcat';
import {
    createShapeCastHit,
    getShapeHalfExtentY,
    type PhysicsBackend,
    QueryStatus,
} from '../backend/backend';
import type { ControlledBody } from '../body';
import { isSlopeTooSteep, UP } from '../ground/ground-probe';
import type { ControllerSettings } from '../settings';

export enum StepResult {
    /** nothing blocking the way, or the probe was skipped */
    NONE = 0,
    /** a climbable obstacle, `height` is how far to lift */
    STEP = 1,
    /** an obstacle too high or without headroom, `normal` is its face */
    WALL = 2,
}

export type StepProbe = {
    result: StepResult;
    /** obstacle height above the foot, for STEP. Unit: meters */
    height: number;
    /** obstacle face normal, for WALL */
    normal: Vec3;
};

export function createStepProbe(): StepProbe {
    return {
        result: StepResult.NONE,
        height: 0,
        normal: vec3.fromValues(0, 0, 0),
    };
}

export function resetStepProbe(probe: StepProbe): void {
    probe.result = StepResult.NONE;
    probe.height = 0;
    vec3.set(probe.normal, 0, 0, 0);
}

const DOWN: Vec3 = [0, -1, 0];

const _probeStep_position = /* @__PURE__ */ vec3.create();
const _probeStep_origin = /* @__PURE__ */ vec3.create();
const _probeStep_hit = /* @__PURE__ */ createShapeCastHit();
const _probeStep_topHit = /* @__PURE__ */ createShapeCastHit();

function setWall(out: StepProbe, normal: Vec3): void {
    out.result = StepResult.WALL;
    out.height = 0;
    vec3.copy(out.normal, normal);
}

/**
 * Looks for an obstacle in front of the foot and decides whether it can be stepped onto.
 *
 * 1. a ray at foot + stepProbeHeight along `direction`, reaching radius + max(speed * dt, minStepForward) + skinWidth.
 *    Walkable hits are ramps and are left to the ground probe.
 * 2. a ray down onto the obstacle top, stepForwardTest past the hit, from stepUpHeight + skinWidth above the foot.
 * 3. a ray up from the head, the lift must be clear.
 *
 * `out` is reset to NONE first. A failed query leaves it NONE and its status is returned.
 *
 * @param direction horizontal unit direction of travel
 * @param speed target horizontal speed, m/s
 */
export function probeStep(
    out: StepProbe,
    backend: PhysicsBackend,
    body: ControlledBody,
    settings: ControllerSettings,
    direction: Vec3,
    speed: number,
    dt: number,
): QueryStatus {
    resetStepProbe(out);

    if (settings.stepUpHeight <= 0 || speed <= 0) {
        return QueryStatus.OK;
    }

    const positionStatus = backend.getPosition(_probeStep_position, body.ref);
    if (positionStatus !== QueryStatus.OK) {
        return positionStatus;
    }

    const halfExtentY = getShapeHalfExtentY(body.shape);
    const footY = _probeStep_position[1] - halfExtentY;

    /* forward */
    vec3.set(_probeStep_origin, _probeStep_position[0], footY + settings.stepProbeHeight, _probeStep_position[2]);
    const reach = body.shape.radius + Math.max(speed * dt, settings.minStepForward) + settings.skinWidth;
    const forwardStatus = backend.castRay(_probeStep_hit, body.ref, _probeStep_origin, direction, reach);
    if (forwardStatus === QueryStatus.NO_HIT) {
        return QueryStatus.OK;
    }
    if (forwardStatus !== QueryStatus.OK) {
        return forwardStatus;
    }

    const face = _probeStep_hit;
    if (!isSlopeTooSteep(face.normal, settings.maxSlopeAngle)) {
        // a ramp, not a step
        return QueryStatus.OK;
    }

    /* down onto the top */
    const probeTop = settings.stepUpHeight + settings.skinWidth;
    vec3.scaleAndAdd(_probeStep_origin, face.point, direction, settings.stepForwardTest);
    _probeStep_origin[1] = footY + probeTop;
    const topStatus = backend.castRay(_probeStep_topHit, body.ref, _probeStep_origin, DOWN, probeTop);
    if (topStatus === QueryStatus.NO_HIT) {
        setWall(out, face.normal);
        return QueryStatus.OK;
    }
    if (topStatus !== QueryStatus.OK) {
        return topStatus;
    }

    const top = _probeStep_topHit;
    const height = probeTop - top.distance;
    if (height <= 0 || height >= settings.stepUpHeight || isSlopeTooSteep(top.normal, settings.maxSlopeAngle)) {
        setWall(out, face.normal);
        return QueryStatus.OK;
    }

    /* headroom */
    vec3.set(_probeStep_origin, _probeStep_position[0], _probeStep_position[1] + halfExtentY, _probeStep_position[2]);
    const headStatus = backend.castRay(_probeStep_topHit, body.ref, _probeStep_origin, UP, height);
    if (headStatus === QueryStatus.OK) {
        setWall(out, face.normal);
        return QueryStatus.OK;
    }
    if (headStatus !== QueryStatus.NO_HIT) {
        return headStatus;
    }

    out.result = StepResult.STEP;
    out.height = height;
    return QueryStatus.OK;
}
