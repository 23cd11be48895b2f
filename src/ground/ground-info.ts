import { type Vec3, vec3 } from 'mathcat';

/** ground classification of a character for one tick */
export enum GroundState {
    /** walkable contact within skin width, can move freely */
    GROUNDED = 0,
    /** contact steeper than the max slope angle, slides down */
    SLOPED = 1,
    /** no supporting contact */
    AIRBORNE = 2,
}

/** information about the character's ground contact */
export type GroundInfo = {
    /** current ground state */
    state: GroundState;
    /** ground contact normal, up when there is no contact */
    normal: Vec3;
    /** gap between the bottom of the probe shape and the ground, Infinity when there is no contact */
    distance: number;
    /** angle between the ground normal and up, in radians */
    angle: number;
    /** world-space contact point */
    point: Vec3;
    /** the character was moved down onto this ground during the tick */
    snapped: boolean;
};

export function createGroundInfo(): GroundInfo {
    return {
        state: GroundState.AIRBORNE,
        normal: vec3.fromValues(0, 1, 0),
        distance: Number.POSITIVE_INFINITY,
        angle: 0,
        point: vec3.create(),
        snapped: false,
    };
}

export function resetGroundInfo(ground: GroundInfo): void {
    ground.state = GroundState.AIRBORNE;
    vec3.set(ground.normal, 0, 1, 0);
    ground.distance = Number.POSITIVE_INFINITY;
    ground.angle = 0;
    vec3.set(ground.point, 0, 0, 0);
    ground.snapped = false;
}

/** whether the character stands on something, walkable or not */
export function isSupported(ground: GroundInfo): boolean {
    return ground.state === GroundState.GROUNDED || ground.state === GroundState.SLOPED;
}
