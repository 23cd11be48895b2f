import { type Vec3, vec3 } from 'mathcat';

/** a body inside a physics backend, e.g. a rapier RigidBodyHandle or a box world body id */
export type BodyRef = number;

/** result of every backend call, backends never throw for a missing body */
export enum QueryStatus {
    /** the call succeeded, for casts: a hit was written to the out parameter */
    OK = 0,
    /** cast found nothing within range */
    NO_HIT = 1,
    /** the body does not exist (anymore) */
    BODY_NOT_FOUND = 2,
    /** the query could not be performed, e.g. degenerate shape or non-finite input */
    QUERY_FAILED = 3,
}

export enum ProbeShapeType {
    CAPSULE = 0,
    CYLINDER = 1,
}

/**
 * Vertical probe shape, axis along world up.
 *
 * For a capsule, halfHeight is the half length of the straight segment, the total half height is halfHeight + radius.
 * For a cylinder, halfHeight is the total half height.
 */
export type ProbeShape = {
    type: ProbeShapeType;
    halfHeight: number;
    radius: number;
};

/** closest hit of a shape or ray cast */
export type ShapeCastHit = {
    /** world-space contact point */
    point: Vec3;
    /** surface normal, pointing out of the hit surface */
    normal: Vec3;
    /** distance travelled along the cast direction before contact */
    distance: number;
};

export function createShapeCastHit(): ShapeCastHit {
    return {
        point: vec3.create(),
        normal: vec3.fromValues(0, 1, 0),
        distance: 0,
    };
}

/**
 * Capability interface every physics engine integration implements once.
 *
 * All queries ignore the colliders of the given body and report only the closest hit.
 * Results are written to out parameters, the return value is the status.
 */
export type PhysicsBackend = {
    /** backend name, for logs */
    readonly name: string;

    /** sweeps `shape` from `origin` along the unit `direction` up to `maxDistance` */
    castShape(
        out: ShapeCastHit,
        body: BodyRef,
        shape: ProbeShape,
        origin: Vec3,
        direction: Vec3,
        maxDistance: number,
    ): QueryStatus;

    /** casts a zero-width ray from `origin` along the unit `direction` up to `maxDistance` */
    castRay(out: ShapeCastHit, body: BodyRef, origin: Vec3, direction: Vec3, maxDistance: number): QueryStatus;

    getPosition(out: Vec3, body: BodyRef): QueryStatus;

    getLinearVelocity(out: Vec3, body: BodyRef): QueryStatus;

    setLinearVelocity(body: BodyRef, velocity: Vec3): QueryStatus;

    /** applies a force for the next simulation step */
    applyForce(body: BodyRef, force: Vec3): QueryStatus;

    /** applies an instant change of momentum, velocity changes by impulse / mass */
    applyImpulse(body: BodyRef, impulse: Vec3): QueryStatus;

    /**
     * Moves the body by `displacement`, stopping at and sliding along obstructions.
     * The displacement actually achieved is written to `outAchieved`.
     * Moves requested within one tick compose, `getPosition` reports the position after them.
     */
    moveKinematic(outAchieved: Vec3, body: BodyRef, displacement: Vec3): QueryStatus;
};

/** total half height of the probe shape along up */
export function getShapeHalfExtentY(shape: ProbeShape): number {
    return shape.type === ProbeShapeType.CAPSULE ? shape.halfHeight + shape.radius : shape.halfHeight;
}

export function isFiniteVec3(v: Vec3): boolean {
    return Number.isFinite(v[0]) && Number.isFinite(v[1]) && Number.isFinite(v[2]);
}

/** common input validation for casts, shared by backends */
export function isValidCast(origin: Vec3, direction: Vec3, maxDistance: number): boolean {
    if (!isFiniteVec3(origin) || !isFiniteVec3(direction)) return false;
    if (!Number.isFinite(maxDistance) || maxDistance < 0) return false;
    const lengthSq = vec3.squaredLength(direction);
    return Math.abs(lengthSq - 1) < 1e-3;
}

export function isValidShape(shape: ProbeShape): boolean {
    if (!Number.isFinite(shape.radius) || !Number.isFinite(shape.halfHeight) || shape.radius <= 0) return false;
    return shape.type === ProbeShapeType.CAPSULE ? shape.halfHeight >= 0 : shape.halfHeight > 0;
}
