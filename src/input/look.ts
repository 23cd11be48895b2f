import { type Vec3, vec3 } from 'mathcat';

export type LookSettings = {
    /**
     * Radians turned per unit of pointer movement.
     * @default 0.002
     */
    sensitivity: number;
    /**
     * Pitch is clamped to [-maxPitch, maxPitch].
     * Unit: radians
     * @default ~1.553 (89°)
     */
    maxPitch: number;
};

export function createLookSettings(): LookSettings {
    return {
        sensitivity: 0.002,
        maxPitch: (89 * Math.PI) / 180,
    };
}

/**
 * Look direction as yaw around up and pitch around the right axis.
 * At yaw 0 and pitch 0 the character looks along -z with +x to its right.
 */
export type Look = {
    settings: LookSettings;
    /** radians, positive turns left */
    yaw: number;
    /** radians, positive looks up */
    pitch: number;
    forward: Vec3;
    right: Vec3;
    up: Vec3;
};

export function create(settings: LookSettings = createLookSettings()): Look {
    const look: Look = {
        settings,
        yaw: 0,
        pitch: 0,
        forward: vec3.fromValues(0, 0, -1),
        right: vec3.fromValues(1, 0, 0),
        up: vec3.fromValues(0, 1, 0),
    };
    updateVectors(look);
    return look;
}

function wrapAngle(angle: number): number {
    const twoPi = Math.PI * 2;
    const wrapped = angle % twoPi;
    if (wrapped > Math.PI) return wrapped - twoPi;
    if (wrapped < -Math.PI) return wrapped + twoPi;
    return wrapped;
}

function updateVectors(look: Look): void {
    const cosPitch = Math.cos(look.pitch);
    const sinYaw = Math.sin(look.yaw);
    const cosYaw = Math.cos(look.yaw);

    vec3.set(look.forward, -sinYaw * cosPitch, Math.sin(look.pitch), -cosYaw * cosPitch);
    vec3.set(look.right, cosYaw, 0, -sinYaw);
    vec3.cross(look.up, look.right, look.forward);
    vec3.normalize(look.up, look.up);
}

/** sets yaw and pitch directly, wrapping yaw to [-π, π] and clamping pitch */
export function set(look: Look, yaw: number, pitch: number): void {
    look.yaw = wrapAngle(yaw);
    look.pitch = Math.min(look.settings.maxPitch, Math.max(-look.settings.maxPitch, pitch));
    updateVectors(look);
}

/**
 * Applies a pointer delta, e.g. from mouse movement.
 * Moving right turns right, moving down looks down.
 */
export function applyDelta(look: Look, deltaX: number, deltaY: number): void {
    const { sensitivity } = look.settings;
    set(look, look.yaw - deltaX * sensitivity, look.pitch - deltaY * sensitivity);
}

/** forward projected onto the ground plane, zero when looking straight up or down */
export function getHorizontalForward(out: Vec3, look: Look): Vec3 {
    vec3.set(out, look.forward[0], 0, look.forward[2]);
    const length = vec3.length(out);
    if (length < 1e-6) {
        vec3.set(out, 0, 0, 0);
        return out;
    }
    vec3.scale(out, out, 1 / length);
    return out;
}
