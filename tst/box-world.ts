import { type Vec3, vec3 } from 'mathcat';
import {
    allocateSlot,
    createSlots,
    getSlot,
    iterateSlots,
    type PackedId,
    releaseSlot,
    type Slots,
} from '../src/utils/packed-id';
import {
    type BodyRef,
    getShapeHalfExtentY,
    isFiniteVec3,
    isValidCast,
    isValidShape,
    type PhysicsBackend,
    type ProbeShape,
    ProbeShapeType,
    QueryStatus,
    type ShapeCastHit,
} from '../src/backend/backend';
import { createSlideSettings, type SlideSettings, slide } from '../src/backend/slide';

/*
 * A small swept-box physics world for deterministic controller tests.
 *
 * Casts sweep the bounding box of the probe shape, so a capsule behaves like a box at its corners.
 * Static geometry is made of axis aligned boxes and bounded ramps, bodies are boxes too.
 */

export enum MotionType {
    /** moved only by velocity and moveKinematic, ignores gravity and forces */
    KINEMATIC = 0,
    /** integrates gravity and forces */
    DYNAMIC = 1,
}

export enum ColliderType {
    BOX = 0,
    RAMP = 1,
}

/** static axis aligned box */
export type BoxCollider = {
    type: ColliderType.BOX;
    min: Vec3;
    max: Vec3;
};

/**
 * Static ramp: the surface plane through `center` with the up-facing `normal`, solid below the surface,
 * bounded in x and z by the footprint around `center`.
 */
export type RampCollider = {
    type: ColliderType.RAMP;
    center: Vec3;
    normal: Vec3;
    halfExtentX: number;
    halfExtentZ: number;
};

export type StaticCollider = BoxCollider | RampCollider;

export type WorldBody = {
    id: PackedId;
    index: number;
    sequence: number;
    pooled: boolean;

    motionType: MotionType;
    shape: ProbeShape;
    position: Vec3;
    linearVelocity: Vec3;
    /** force accumulated for the next step, cleared by step() */
    force: Vec3;
    mass: number;
    gravityFactor: number;
};

export type WorldBodySettings = {
    shape: ProbeShape;
    position: Vec3;
    /** @default MotionType.KINEMATIC */
    motionType?: MotionType;
    /** @default 1 */
    mass?: number;
    /** @default 1 */
    gravityFactor?: number;
    /** @default [0,0,0] */
    linearVelocity?: Vec3;
};

export type BoxWorldSettings = {
    /**
     * Gravity vector.
     * Unit: m/s²
     * @default [0,-9.81,0]
     */
    gravity: Vec3;

    /** collide-and-slide of moved bodies */
    slide: SlideSettings;
};

export type BoxWorld = {
    settings: BoxWorldSettings;
    colliders: StaticCollider[];
    bodies: Slots<WorldBody>;
};

export function createBoxWorldSettings(): BoxWorldSettings {
    return {
        gravity: vec3.fromValues(0, -9.81, 0),
        slide: createSlideSettings(),
    };
}

export function create(settings: BoxWorldSettings = createBoxWorldSettings()): BoxWorld {
    return {
        settings,
        colliders: [],
        bodies: createSlots(),
    };
}

/**
 * Adds a static box spanning min to max.
 * @returns the collider
 */
export function addBox(world: BoxWorld, min: Vec3, max: Vec3): BoxCollider {
    const collider: BoxCollider = {
        type: ColliderType.BOX,
        min: vec3.fromValues(Math.min(min[0], max[0]), Math.min(min[1], max[1]), Math.min(min[2], max[2])),
        max: vec3.fromValues(Math.max(min[0], max[0]), Math.max(min[1], max[1]), Math.max(min[2], max[2])),
    };
    world.colliders.push(collider);
    return collider;
}

export type RampSettings = {
    /** a point on the ramp surface, the footprint is centered on it */
    center: Vec3;
    /** slope angle in radians, the surface rises toward +x */
    angle: number;
    /** footprint half size along x */
    halfExtentX: number;
    /** footprint half size along z */
    halfExtentZ: number;
};

/**
 * Adds a static ramp rising toward +x.
 * @returns the collider
 */
export function addRamp(world: BoxWorld, settings: RampSettings): RampCollider {
    const collider: RampCollider = {
        type: ColliderType.RAMP,
        center: vec3.clone(settings.center),
        normal: vec3.fromValues(-Math.sin(settings.angle), Math.cos(settings.angle), 0),
        halfExtentX: settings.halfExtentX,
        halfExtentZ: settings.halfExtentZ,
    };
    world.colliders.push(collider);
    return collider;
}

function makeWorldBody(): WorldBody {
    return {
        id: -1,
        index: -1,
        sequence: 0,
        pooled: true,
        motionType: MotionType.KINEMATIC,
        shape: { type: ProbeShapeType.CAPSULE, halfHeight: 0, radius: 0 },
        position: vec3.create(),
        linearVelocity: vec3.create(),
        force: vec3.create(),
        mass: 1,
        gravityFactor: 1,
    };
}

export function addBody(world: BoxWorld, settings: WorldBodySettings): WorldBody {
    const body = allocateSlot(world.bodies, makeWorldBody);
    body.motionType = settings.motionType ?? MotionType.KINEMATIC;
    body.shape = { ...settings.shape };
    vec3.copy(body.position, settings.position);
    if (settings.linearVelocity) {
        vec3.copy(body.linearVelocity, settings.linearVelocity);
    } else {
        vec3.set(body.linearVelocity, 0, 0, 0);
    }
    vec3.set(body.force, 0, 0, 0);
    body.mass = settings.mass ?? 1;
    body.gravityFactor = settings.gravityFactor ?? 1;
    return body;
}

export function getBody(world: BoxWorld, id: BodyRef): WorldBody | undefined {
    return getSlot(world.bodies, id);
}

/**
 * Removes a body, its id becomes stale.
 * @returns false if the body was already removed
 */
export function removeBody(world: BoxWorld, id: BodyRef): boolean {
    const body = getSlot(world.bodies, id);
    if (!body) return false;
    return releaseSlot(world.bodies, body);
}

function getBodyHalfExtents(out: Vec3, body: WorldBody): Vec3 {
    return vec3.set(out, body.shape.radius, getShapeHalfExtentY(body.shape), body.shape.radius);
}

/* casting */

const _sweep_expandedMin = /* @__PURE__ */ vec3.create();
const _sweep_expandedMax = /* @__PURE__ */ vec3.create();

/** sweeps a box with half extents `halfExtents` against an axis aligned box, writes a hit closer than out.distance */
function sweepVsBox(
    out: ShapeCastHit,
    min: Vec3,
    max: Vec3,
    origin: Vec3,
    halfExtents: Vec3,
    direction: Vec3,
    maxDistance: number,
): boolean {
    // minkowski sum: sweep the box center as a ray against the expanded box
    vec3.subtract(_sweep_expandedMin, min, halfExtents);
    vec3.add(_sweep_expandedMax, max, halfExtents);

    let tEnter = -Infinity;
    let tExit = Infinity;
    let enterAxis = -1;

    for (let i = 0; i < 3; i++) {
        const d = direction[i];
        if (Math.abs(d) < 1e-12) {
            if (origin[i] < _sweep_expandedMin[i] || origin[i] > _sweep_expandedMax[i]) {
                return false;
            }
            continue;
        }
        const t0 = (_sweep_expandedMin[i] - origin[i]) / d;
        const t1 = (_sweep_expandedMax[i] - origin[i]) / d;
        const tNear = t0 < t1 ? t0 : t1;
        const tFar = t0 < t1 ? t1 : t0;
        if (tNear > tEnter) {
            tEnter = tNear;
            enterAxis = i;
        }
        if (tFar < tExit) {
            tExit = tFar;
        }
    }

    if (tEnter > tExit || tExit < 0) {
        return false;
    }

    if (enterAxis === -1 || tEnter < 0) {
        // starting in overlap, push out along the axis of least penetration
        let bestDepth = Infinity;
        let bestAxis = 1;
        let bestSign = 1;
        for (let i = 0; i < 3; i++) {
            const below = origin[i] - _sweep_expandedMin[i];
            const above = _sweep_expandedMax[i] - origin[i];
            if (below < bestDepth) {
                bestDepth = below;
                bestAxis = i;
                bestSign = -1;
            }
            if (above < bestDepth) {
                bestDepth = above;
                bestAxis = i;
                bestSign = 1;
            }
        }
        // only contacts opposing the sweep count
        if (direction[bestAxis] * bestSign >= 0) {
            return false;
        }
        if (out.distance <= 0) {
            return false;
        }
        vec3.set(out.normal, 0, 0, 0);
        out.normal[bestAxis] = bestSign;
        out.distance = 0;
        clampToBox(out.point, origin, min, max);
        return true;
    }

    if (tEnter > maxDistance || tEnter >= out.distance) {
        return false;
    }

    const sign = direction[enterAxis] > 0 ? -1 : 1;
    vec3.set(out.normal, 0, 0, 0);
    out.normal[enterAxis] = sign;
    out.distance = Math.max(0, tEnter);
    vec3.scaleAndAdd(out.point, origin, direction, out.distance);
    out.point[enterAxis] -= sign * halfExtents[enterAxis];
    clampToBox(out.point, out.point, min, max);
    return true;
}

function clampToBox(out: Vec3, point: Vec3, min: Vec3, max: Vec3): void {
    out[0] = Math.min(Math.max(point[0], min[0]), max[0]);
    out[1] = Math.min(Math.max(point[1], min[1]), max[1]);
    out[2] = Math.min(Math.max(point[2], min[2]), max[2]);
}

const _ramp_support = /* @__PURE__ */ vec3.create();
const _ramp_relative = /* @__PURE__ */ vec3.create();
const _ramp_point = /* @__PURE__ */ vec3.create();

function isInsideRampFootprint(ramp: RampCollider, point: Vec3): boolean {
    return (
        Math.abs(point[0] - ramp.center[0]) <= ramp.halfExtentX && Math.abs(point[2] - ramp.center[2]) <= ramp.halfExtentZ
    );
}

/** sweeps a box against a ramp surface using the box corner deepest along -normal */
function sweepVsRamp(
    out: ShapeCastHit,
    ramp: RampCollider,
    origin: Vec3,
    halfExtents: Vec3,
    direction: Vec3,
    maxDistance: number,
): boolean {
    const n = ramp.normal;

    // support point of the box in direction -n
    for (let i = 0; i < 3; i++) {
        _ramp_support[i] = origin[i] + (n[i] > 0 ? -halfExtents[i] : n[i] < 0 ? halfExtents[i] : 0);
    }

    const denom = vec3.dot(n, direction);
    const signedDistance = vec3.dot(n, vec3.subtract(_ramp_relative, _ramp_support, ramp.center));

    if (signedDistance < 0) {
        // the corner is below the surface, it only counts if the center is still above it
        const centerDistance = vec3.dot(n, vec3.subtract(_ramp_relative, origin, ramp.center));
        if (centerDistance < 0 || denom >= 0 || out.distance <= 0) {
            return false;
        }
        if (!isInsideRampFootprint(ramp, _ramp_support)) {
            return false;
        }
        vec3.copy(out.point, _ramp_support);
        vec3.copy(out.normal, n);
        out.distance = 0;
        return true;
    }

    if (denom >= -1e-12) {
        return false;
    }

    const t = signedDistance / -denom;
    if (t > maxDistance || t >= out.distance) {
        return false;
    }

    vec3.scaleAndAdd(_ramp_point, _ramp_support, direction, t);
    if (!isInsideRampFootprint(ramp, _ramp_point)) {
        return false;
    }

    vec3.copy(out.point, _ramp_point);
    vec3.copy(out.normal, n);
    out.distance = t;
    return true;
}

const _cast_otherMin = /* @__PURE__ */ vec3.create();
const _cast_otherMax = /* @__PURE__ */ vec3.create();
const _cast_otherHalfExtents = /* @__PURE__ */ vec3.create();

/**
 * Sweeps a box through the world, ignoring the body at `ignoreIndex`.
 * @returns true if a hit was written to out
 */
export function castBox(
    out: ShapeCastHit,
    world: BoxWorld,
    ignoreIndex: number,
    origin: Vec3,
    halfExtents: Vec3,
    direction: Vec3,
    maxDistance: number,
): boolean {
    out.distance = Infinity;
    let hit = false;

    for (const collider of world.colliders) {
        if (collider.type === ColliderType.BOX) {
            hit = sweepVsBox(out, collider.min, collider.max, origin, halfExtents, direction, maxDistance) || hit;
        } else {
            hit = sweepVsRamp(out, collider, origin, halfExtents, direction, maxDistance) || hit;
        }
    }

    for (const other of iterateSlots(world.bodies)) {
        if (other.index === ignoreIndex) continue;
        getBodyHalfExtents(_cast_otherHalfExtents, other);
        vec3.subtract(_cast_otherMin, other.position, _cast_otherHalfExtents);
        vec3.add(_cast_otherMax, other.position, _cast_otherHalfExtents);
        hit = sweepVsBox(out, _cast_otherMin, _cast_otherMax, origin, halfExtents, direction, maxDistance) || hit;
    }

    return hit;
}

/* moving */

const _move_halfExtents = /* @__PURE__ */ vec3.create();
const _move_start = /* @__PURE__ */ vec3.create();

/**
 * Moves a body by a displacement with collide-and-slide, optionally removing velocity into hit surfaces.
 * @param outAchieved the displacement achieved
 */
export function moveBody(
    world: BoxWorld,
    body: WorldBody,
    displacement: Vec3,
    outAchieved: Vec3,
    velocity: Vec3 | undefined,
): void {
    getBodyHalfExtents(_move_halfExtents, body);
    vec3.copy(_move_start, body.position);

    slide(
        body.position,
        body.position,
        displacement,
        (out, origin, direction, maxDistance) =>
            castBox(out, world, body.index, origin, _move_halfExtents, direction, maxDistance)
                ? QueryStatus.OK
                : QueryStatus.NO_HIT,
        world.settings.slide,
        velocity,
    );

    vec3.subtract(outAchieved, body.position, _move_start);
}

const _step_acceleration = /* @__PURE__ */ vec3.create();
const _step_displacement = /* @__PURE__ */ vec3.create();
const _step_achieved = /* @__PURE__ */ vec3.create();

/**
 * Advances the world by one step: integrates velocities (gravity and forces for dynamic bodies)
 * and moves every body with collide-and-slide. Forces are cleared afterwards.
 */
export function step(world: BoxWorld, deltaTime: number): void {
    for (const body of iterateSlots(world.bodies)) {
        if (body.motionType === MotionType.DYNAMIC) {
            vec3.scale(_step_acceleration, world.settings.gravity, body.gravityFactor);
            vec3.scaleAndAdd(_step_acceleration, _step_acceleration, body.force, 1 / body.mass);
            vec3.scaleAndAdd(body.linearVelocity, body.linearVelocity, _step_acceleration, deltaTime);
        }
        vec3.set(body.force, 0, 0, 0);

        vec3.scale(_step_displacement, body.linearVelocity, deltaTime);
        moveBody(world, body, _step_displacement, _step_achieved, body.linearVelocity);
    }
}

/* backend */

const _backend_halfExtents = /* @__PURE__ */ vec3.create();
const _backend_rayHalfExtents = /* @__PURE__ */ vec3.create();

/**
 * Creates the physics backend for a box world.
 * Moves requested through moveKinematic are applied immediately.
 */
export function createBackend(world: BoxWorld): PhysicsBackend {
    return {
        name: 'box-world',

        castShape(out, ref, shape, origin, direction, maxDistance) {
            const body = getSlot(world.bodies, ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            if (!isValidShape(shape) || !isValidCast(origin, direction, maxDistance)) return QueryStatus.QUERY_FAILED;

            vec3.set(_backend_halfExtents, shape.radius, getShapeHalfExtentY(shape), shape.radius);
            return castBox(out, world, body.index, origin, _backend_halfExtents, direction, maxDistance)
                ? QueryStatus.OK
                : QueryStatus.NO_HIT;
        },

        castRay(out, ref, origin, direction, maxDistance) {
            const body = getSlot(world.bodies, ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            if (!isValidCast(origin, direction, maxDistance)) return QueryStatus.QUERY_FAILED;

            return castBox(out, world, body.index, origin, _backend_rayHalfExtents, direction, maxDistance)
                ? QueryStatus.OK
                : QueryStatus.NO_HIT;
        },

        getPosition(out, ref) {
            const body = getSlot(world.bodies, ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            vec3.copy(out, body.position);
            return QueryStatus.OK;
        },

        getLinearVelocity(out, ref) {
            const body = getSlot(world.bodies, ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            vec3.copy(out, body.linearVelocity);
            return QueryStatus.OK;
        },

        setLinearVelocity(ref, velocity) {
            const body = getSlot(world.bodies, ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            if (!isFiniteVec3(velocity)) return QueryStatus.QUERY_FAILED;
            vec3.copy(body.linearVelocity, velocity);
            return QueryStatus.OK;
        },

        applyForce(ref, force) {
            const body = getSlot(world.bodies, ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            if (!isFiniteVec3(force)) return QueryStatus.QUERY_FAILED;
            vec3.add(body.force, body.force, force);
            return QueryStatus.OK;
        },

        applyImpulse(ref, impulse) {
            const body = getSlot(world.bodies, ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            if (!isFiniteVec3(impulse)) return QueryStatus.QUERY_FAILED;
            if (body.motionType === MotionType.DYNAMIC) {
                vec3.scaleAndAdd(body.linearVelocity, body.linearVelocity, impulse, 1 / body.mass);
            }
            return QueryStatus.OK;
        },

        moveKinematic(outAchieved, ref, displacement) {
            const body = getSlot(world.bodies, ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            if (!isFiniteVec3(displacement)) return QueryStatus.QUERY_FAILED;
            moveBody(world, body, displacement, outAchieved, undefined);
            return QueryStatus.OK;
        },
    };
}
