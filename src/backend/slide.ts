import { type Vec3, vec3 } from 'mathcat';
import { createShapeCastHit, QueryStatus, type ShapeCastHit } from './backend';

/**
 * Sweeps the moving body's shape from `origin` along the unit `direction`.
 * Writes the closest hit opposing the direction and returns OK, or NO_HIT.
 */
export type SweepFn = (out: ShapeCastHit, origin: Vec3, direction: Vec3, maxDistance: number) => QueryStatus;

export type SlideSettings = {
    /**
     * Clearance kept between the moved shape and what it hits.
     * Unit: meters
     * @default 1e-3
     */
    contactOffset: number;

    /**
     * Max sweeps per move, each hit uses one.
     * @default 4
     */
    maxIterations: number;
};

export function createSlideSettings(): SlideSettings {
    return {
        contactOffset: 1e-3,
        maxIterations: 4,
    };
}

const _slide_remaining = /* @__PURE__ */ vec3.create();
const _slide_direction = /* @__PURE__ */ vec3.create();
const _slide_hit = /* @__PURE__ */ createShapeCastHit();

/**
 * Collide-and-slide: moves from `start` by `displacement`, stopping `contactOffset` short of each hit
 * and projecting what is left of the move onto the hit surface.
 *
 * @param outPosition the position reached, may alias start
 * @param velocity when given, the component into each hit surface is removed
 * @returns OK, or the first sweep status that was neither OK nor NO_HIT
 */
export function slide(
    outPosition: Vec3,
    start: Vec3,
    displacement: Vec3,
    sweep: SweepFn,
    settings: SlideSettings,
    velocity?: Vec3,
): QueryStatus {
    vec3.copy(outPosition, start);
    vec3.copy(_slide_remaining, displacement);

    for (let i = 0; i < settings.maxIterations; i++) {
        const length = vec3.length(_slide_remaining);
        if (length < 1e-9) break;

        vec3.scale(_slide_direction, _slide_remaining, 1 / length);

        const status = sweep(_slide_hit, outPosition, _slide_direction, length);
        if (status === QueryStatus.NO_HIT) {
            vec3.add(outPosition, outPosition, _slide_remaining);
            break;
        }
        if (status !== QueryStatus.OK) return status;

        const travel = Math.max(0, _slide_hit.distance - settings.contactOffset);
        vec3.scaleAndAdd(outPosition, outPosition, _slide_direction, travel);

        vec3.scale(_slide_remaining, _slide_direction, length - travel);
        const intoSurface = vec3.dot(_slide_remaining, _slide_hit.normal);
        if (intoSurface < 0) {
            vec3.scaleAndAdd(_slide_remaining, _slide_remaining, _slide_hit.normal, -intoSurface);
        }

        if (velocity) {
            const velocityIntoSurface = vec3.dot(velocity, _slide_hit.normal);
            if (velocityIntoSurface < 0) {
                vec3.scaleAndAdd(velocity, velocity, _slide_hit.normal, -velocityIntoSurface);
            }
        }
    }

    return QueryStatus.OK;
}
