import RAPIER from '@dimforge/rapier3d-compat';
import { type Vec3, vec3 } from 'mathcat';
import {
    type BodyRef,
    isFiniteVec3,
    isValidCast,
    isValidShape,
    type PhysicsBackend,
    type ProbeShape,
    ProbeShapeType,
    QueryStatus,
    type ShapeCastHit,
} from './backend';
import * as shapeCache from './shape-cache';
import { createSlideSettings, type SlideSettings, slide } from './slide';

export type RapierBackendSettings = SlideSettings & {
    /**
     * Probe shapes kept converted to rapier shapes.
     * @default 8
     */
    shapeCacheSize: number;
};

export function createRapierBackendSettings(): RapierBackendSettings {
    return {
        ...createSlideSettings(),
        shapeCacheSize: 8,
    };
}

/** a kinematic translation requested since the last world step */
type PendingTranslation = {
    /** body translation when the move was requested */
    base: Vec3;
    /** translation the body reaches on the next step */
    target: Vec3;
};

const IDENTITY_ROTATION = { x: 0, y: 0, z: 0, w: 1 };

function toVector(v: Vec3): RAPIER.Vector3 {
    return new RAPIER.Vector3(v[0], v[1], v[2]);
}

function createCastShape(shape: ProbeShape): RAPIER.Shape {
    return shape.type === ProbeShapeType.CAPSULE
        ? new RAPIER.Capsule(shape.halfHeight, shape.radius)
        : new RAPIER.Cylinder(shape.halfHeight, shape.radius);
}

function writeHit(out: ShapeCastHit, hit: RAPIER.ColliderShapeCastHit): void {
    // witness1 and normal1 are on the hit collider, in world space
    vec3.set(out.normal, hit.normal1.x, hit.normal1.y, hit.normal1.z);
    vec3.normalize(out.normal, out.normal);
    vec3.set(out.point, hit.witness1.x, hit.witness1.y, hit.witness1.z);
    out.distance = hit.time_of_impact;
}

function isSameTranslation(a: Vec3, b: RAPIER.Vector): boolean {
    return a[0] === b.x && a[1] === b.y && a[2] === b.z;
}

const _move_start = /* @__PURE__ */ vec3.create();
const _move_end = /* @__PURE__ */ vec3.create();
const _move_colliderOffset = /* @__PURE__ */ vec3.create();
const _move_shapePosition = /* @__PURE__ */ vec3.create();

/**
 * Creates a physics backend over a rapier world.
 *
 * RAPIER.init() must have resolved before any query runs. Scene queries see the world as of the last
 * world.step(). Kinematic bodies reach their moved position on the next step and report it from
 * getPosition until then, dynamic bodies are teleported immediately.
 */
export function createBackend(
    world: RAPIER.World,
    settings: RapierBackendSettings = createRapierBackendSettings(),
): PhysicsBackend {
    const shapes = shapeCache.create(createCastShape, settings.shapeCacheSize);
    const pending = new Map<BodyRef, PendingTranslation>();

    const getBody = (ref: BodyRef): RAPIER.RigidBody | undefined => {
        const body = world.getRigidBody(ref);
        if (!body) {
            pending.delete(ref);
            return undefined;
        }
        return body;
    };

    /** the pending move of a kinematic body, dropped once the world stepped or the host moved the body */
    const getPending = (ref: BodyRef, body: RAPIER.RigidBody): PendingTranslation | undefined => {
        const entry = pending.get(ref);
        if (!entry) return undefined;
        if (!body.isKinematic() || !isSameTranslation(entry.base, body.translation())) {
            pending.delete(ref);
            return undefined;
        }
        return entry;
    };

    const getTranslation = (out: Vec3, ref: BodyRef, body: RAPIER.RigidBody): Vec3 => {
        const entry = getPending(ref, body);
        if (entry) return vec3.copy(out, entry.target);
        const translation = body.translation();
        return vec3.set(out, translation.x, translation.y, translation.z);
    };

    return {
        name: 'rapier',

        castShape(out, ref, shape, origin, direction, maxDistance) {
            const body = getBody(ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            if (!isValidShape(shape) || !isValidCast(origin, direction, maxDistance)) return QueryStatus.QUERY_FAILED;

            const hit = world.castShape(
                toVector(origin),
                IDENTITY_ROTATION,
                toVector(direction),
                shapeCache.get(shapes, shape),
                0,
                maxDistance,
                false,
                RAPIER.QueryFilterFlags.EXCLUDE_SENSORS,
                undefined,
                undefined,
                body,
            );
            if (!hit) return QueryStatus.NO_HIT;

            writeHit(out, hit);
            return QueryStatus.OK;
        },

        castRay(out, ref, origin, direction, maxDistance) {
            const body = getBody(ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            if (!isValidCast(origin, direction, maxDistance)) return QueryStatus.QUERY_FAILED;

            const ray = new RAPIER.Ray(toVector(origin), toVector(direction));
            const hit = world.castRayAndGetNormal(
                ray,
                maxDistance,
                true,
                RAPIER.QueryFilterFlags.EXCLUDE_SENSORS,
                undefined,
                undefined,
                body,
            );
            if (!hit) return QueryStatus.NO_HIT;

            const point = ray.pointAt(hit.timeOfImpact);
            vec3.set(out.point, point.x, point.y, point.z);
            vec3.set(out.normal, hit.normal.x, hit.normal.y, hit.normal.z);
            out.distance = hit.timeOfImpact;
            return QueryStatus.OK;
        },

        getPosition(out, ref) {
            const body = getBody(ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            getTranslation(out, ref, body);
            return QueryStatus.OK;
        },

        getLinearVelocity(out, ref) {
            const body = getBody(ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            const velocity = body.linvel();
            vec3.set(out, velocity.x, velocity.y, velocity.z);
            return QueryStatus.OK;
        },

        setLinearVelocity(ref, velocity) {
            const body = getBody(ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            if (!isFiniteVec3(velocity)) return QueryStatus.QUERY_FAILED;
            body.setLinvel(toVector(velocity), true);
            return QueryStatus.OK;
        },

        applyForce(ref, force) {
            const body = getBody(ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            if (!isFiniteVec3(force)) return QueryStatus.QUERY_FAILED;
            // rapier forces persist across steps, keep only this step's force
            body.resetForces(true);
            body.addForce(toVector(force), true);
            return QueryStatus.OK;
        },

        applyImpulse(ref, impulse) {
            const body = getBody(ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            if (!isFiniteVec3(impulse)) return QueryStatus.QUERY_FAILED;
            body.applyImpulse(toVector(impulse), true);
            return QueryStatus.OK;
        },

        moveKinematic(outAchieved, ref, displacement) {
            const body = getBody(ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            if (!isFiniteVec3(displacement)) return QueryStatus.QUERY_FAILED;
            if (body.numColliders() === 0) return QueryStatus.QUERY_FAILED;

            const collider = body.collider(0);
            const colliderShape = collider.shape;
            const colliderRotation = collider.rotation();
            const colliderTranslation = collider.translation();
            const bodyTranslation = body.translation();
            vec3.set(
                _move_colliderOffset,
                colliderTranslation.x - bodyTranslation.x,
                colliderTranslation.y - bodyTranslation.y,
                colliderTranslation.z - bodyTranslation.z,
            );

            getTranslation(_move_start, ref, body);

            const status = slide(
                _move_end,
                _move_start,
                displacement,
                (out, origin, direction, maxDistance) => {
                    vec3.add(_move_shapePosition, origin, _move_colliderOffset);
                    const hit = world.castShape(
                        toVector(_move_shapePosition),
                        colliderRotation,
                        toVector(direction),
                        colliderShape,
                        0,
                        maxDistance,
                        false,
                        RAPIER.QueryFilterFlags.EXCLUDE_SENSORS,
                        undefined,
                        undefined,
                        body,
                    );
                    if (!hit) return QueryStatus.NO_HIT;
                    writeHit(out, hit);
                    return QueryStatus.OK;
                },
                settings,
            );
            if (status !== QueryStatus.OK) return status;

            vec3.subtract(outAchieved, _move_end, _move_start);

            const target = toVector(_move_end);
            if (body.isKinematic()) {
                const entry = pending.get(ref);
                if (entry) {
                    vec3.set(entry.base, bodyTranslation.x, bodyTranslation.y, bodyTranslation.z);
                    vec3.copy(entry.target, _move_end);
                } else {
                    pending.set(ref, {
                        base: vec3.fromValues(bodyTranslation.x, bodyTranslation.y, bodyTranslation.z),
                        target: vec3.clone(_move_end),
                    });
                }
                body.setNextKinematicTranslation(target);
            } else {
                body.setTranslation(target, true);
            }
            return QueryStatus.OK;
        },
    };
}
