import {
    type BodyId,
    CastRayStatus,
    type CastShapeCollector,
    type CastShapeHit,
    type CastShapeSettings,
    CastShapeStatus,
    capsule,
    castRay,
    castShape,
    createClosestCastRayCollector,
    createDefaultCastRaySettings,
    createDefaultCastShapeSettings,
    cylinder,
    filter,
    type RigidBody,
    rigidBody,
    type Shape,
    sphere,
    type World,
} from 'crashcat';
import { type Quat, quat, type Vec3, vec3 } from 'mathcat';
import {
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

export type CrashcatBackendSettings = SlideSettings & {
    /**
     * Objects closer than this count as touching in shape casts.
     * Unit: meters
     * @default 1e-3
     */
    collisionTolerance: number;

    /**
     * Probe shapes kept converted to crashcat shapes.
     * @default 8
     */
    shapeCacheSize: number;
};

export function createCrashcatBackendSettings(): CrashcatBackendSettings {
    return {
        ...createSlideSettings(),
        collisionTolerance: 1e-3,
        shapeCacheSize: 8,
    };
}

const UP: Vec3 = [0, 1, 0];
const SCALE_ONE: Vec3 = [1, 1, 1];
const IDENTITY_ROTATION: Quat = /* @__PURE__ */ quat.create();

/** default crashcat convex radius, kept below half the probe's smallest dimension */
const CONVEX_RADIUS = 0.05;

function createProbeShape(shape: ProbeShape): Shape {
    if (shape.type === ProbeShapeType.CYLINDER) {
        return cylinder.create({
            halfHeight: shape.halfHeight,
            radius: shape.radius,
            convexRadius: Math.min(CONVEX_RADIUS, shape.halfHeight * 0.5, shape.radius * 0.5),
        });
    }
    if (shape.halfHeight === 0) {
        return sphere.create({ radius: shape.radius });
    }
    return capsule.create({ halfHeightOfCylinder: shape.halfHeight, radius: shape.radius });
}

const _surfaceNormal = /* @__PURE__ */ vec3.create();

/** keeps the closest hit opposing the sweep, with the hit body's surface normal where it is more reliable */
class ClosestOpposingHitCollector implements CastShapeCollector {
    bodyIdB = -1;
    earlyOutFraction = 1;
    hasHit = false;
    fraction = 0;
    point = vec3.create();
    normal = vec3.create();
    world: World;
    direction = vec3.create();

    constructor(world: World) {
        this.world = world;
    }

    addHit(hit: CastShapeHit): void {
        if (hit.status !== CastShapeStatus.COLLIDING) return;
        if (hit.fraction >= this.earlyOutFraction) return;

        // moving away from the contact
        if (vec3.dot(hit.normal, this.direction) >= 0) return;

        const body = rigidBody.get(this.world, hit.bodyIdB);
        if (!body || body.sensor) return;

        // the surface normal is steadier than the contact normal, except at edges and corners
        rigidBody.getSurfaceNormal(_surfaceNormal, body, hit.pointB, hit.subShapeIdB);
        if (vec3.dot(hit.normal, _surfaceNormal) < 0) {
            vec3.negate(_surfaceNormal, _surfaceNormal);
        }
        if (vec3.dot(hit.normal, UP) > vec3.dot(_surfaceNormal, UP)) {
            vec3.copy(_surfaceNormal, hit.normal);
        }

        this.hasHit = true;
        this.fraction = hit.fraction;
        this.earlyOutFraction = hit.fraction;
        vec3.copy(this.point, hit.pointB);
        vec3.normalize(this.normal, _surfaceNormal);
    }

    addMiss(): void {
        // no-op
    }

    shouldEarlyOut(): boolean {
        return this.hasHit && this.earlyOutFraction <= 0;
    }

    reset(direction: Vec3): void {
        this.bodyIdB = -1;
        this.earlyOutFraction = 1;
        this.hasHit = false;
        this.fraction = 0;
        vec3.copy(this.direction, direction);
    }
}

const _cast_displacement = /* @__PURE__ */ vec3.create();
const _move_start = /* @__PURE__ */ vec3.create();
const _move_end = /* @__PURE__ */ vec3.create();

/**
 * Creates a physics backend over a crashcat world.
 *
 * Shapes must be registered (registerAllShapes) before the world is queried. Queries see bodies where they
 * are now, kinematic moves teleport the body immediately.
 */
export function createBackend(
    world: World,
    settings: CrashcatBackendSettings = createCrashcatBackendSettings(),
): PhysicsBackend {
    const shapes = shapeCache.create(createProbeShape, settings.shapeCacheSize);

    const castSettings: CastShapeSettings = createDefaultCastShapeSettings();
    castSettings.collisionTolerance = settings.collisionTolerance;
    castSettings.useShrunkenShapeAndConvexRadius = true;

    const raySettings = createDefaultCastRaySettings();
    const rayCollector = createClosestCastRayCollector();
    const collector = new ClosestOpposingHitCollector(world);

    // every query ignores the querying body and sensors
    let ignoredBodyId: BodyId = -1;
    const queryFilter = filter.forWorld(world);
    queryFilter.bodyFilter = (body: RigidBody) => body.id !== ignoredBodyId && !body.sensor;

    const sweep = (
        out: ShapeCastHit,
        body: RigidBody,
        shape: Shape,
        rotation: Quat,
        origin: Vec3,
        direction: Vec3,
        maxDistance: number,
    ): QueryStatus => {
        collector.reset(direction);
        vec3.scale(_cast_displacement, direction, maxDistance);

        ignoredBodyId = body.id;
        castShape(world, collector, castSettings, shape, origin, rotation, SCALE_ONE, _cast_displacement, queryFilter);
        ignoredBodyId = -1;

        if (!collector.hasHit) return QueryStatus.NO_HIT;

        vec3.copy(out.point, collector.point);
        vec3.copy(out.normal, collector.normal);
        out.distance = collector.fraction * maxDistance;
        return QueryStatus.OK;
    };

    return {
        name: 'crashcat',

        castShape(out, ref, shape, origin, direction, maxDistance) {
            const body = rigidBody.get(world, ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            if (!isValidShape(shape) || !isValidCast(origin, direction, maxDistance)) return QueryStatus.QUERY_FAILED;

            return sweep(out, body, shapeCache.get(shapes, shape), IDENTITY_ROTATION, origin, direction, maxDistance);
        },

        castRay(out, ref, origin, direction, maxDistance) {
            const body = rigidBody.get(world, ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            if (!isValidCast(origin, direction, maxDistance)) return QueryStatus.QUERY_FAILED;

            rayCollector.reset();
            ignoredBodyId = body.id;
            castRay(world, rayCollector, raySettings, origin, direction, maxDistance, queryFilter);
            ignoredBodyId = -1;

            const hit = rayCollector.hit;
            if (hit.status !== CastRayStatus.COLLIDING) return QueryStatus.NO_HIT;

            const hitBody = rigidBody.get(world, hit.bodyIdB);
            if (!hitBody) return QueryStatus.QUERY_FAILED;

            out.distance = hit.fraction * maxDistance;
            vec3.scaleAndAdd(out.point, origin, direction, out.distance);
            rigidBody.getSurfaceNormal(out.normal, hitBody, out.point, hit.subShapeId);
            if (vec3.dot(out.normal, direction) > 0) {
                vec3.negate(out.normal, out.normal);
            }
            vec3.normalize(out.normal, out.normal);
            return QueryStatus.OK;
        },

        getPosition(out, ref) {
            const body = rigidBody.get(world, ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            vec3.copy(out, body.position);
            return QueryStatus.OK;
        },

        getLinearVelocity(out, ref) {
            const body = rigidBody.get(world, ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            vec3.copy(out, body.motionProperties.linearVelocity);
            return QueryStatus.OK;
        },

        setLinearVelocity(ref, velocity) {
            const body = rigidBody.get(world, ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            if (!isFiniteVec3(velocity)) return QueryStatus.QUERY_FAILED;
            rigidBody.setLinearVelocity(world, body, velocity);
            return QueryStatus.OK;
        },

        applyForce(ref, force) {
            const body = rigidBody.get(world, ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            if (!isFiniteVec3(force)) return QueryStatus.QUERY_FAILED;
            // accumulated forces are cleared by updateWorld
            rigidBody.addForce(world, body, force, true);
            return QueryStatus.OK;
        },

        applyImpulse(ref, impulse) {
            const body = rigidBody.get(world, ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            if (!isFiniteVec3(impulse)) return QueryStatus.QUERY_FAILED;
            rigidBody.addImpulse(world, body, impulse);
            return QueryStatus.OK;
        },

        moveKinematic(outAchieved, ref, displacement) {
            const body = rigidBody.get(world, ref);
            if (!body) return QueryStatus.BODY_NOT_FOUND;
            if (!isFiniteVec3(displacement)) return QueryStatus.QUERY_FAILED;

            vec3.copy(_move_start, body.position);
            const status = slide(
                _move_end,
                _move_start,
                displacement,
                (out, origin, direction, maxDistance) =>
                    sweep(out, body, body.shape, body.quaternion, origin, direction, maxDistance),
                settings,
            );
            if (status !== QueryStatus.OK) return status;

            vec3.subtract(outAchieved, _move_end, _move_start);
            rigidBody.setPosition(world, body, _move_end, true);
            return QueryStatus.OK;
        },
    };
}
