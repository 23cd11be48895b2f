import { invalidConfiguration } from './errors';

/** how the resolved movement is handed to the physics backend */
export enum ControlMode {
    /** displacement per tick, moved with collide-and-slide */
    KINEMATIC = 0,
    /** linear velocity set on the body */
    VELOCITY = 1,
    /** force applied to the body, the controller owns gravity */
    FORCE = 2,
    /** impulse applied to the body once per tick, the controller owns gravity */
    IMPULSE = 3,
}

export type ControllerSettings = {
    /**
     * How movement is applied to the body.
     * @default ControlMode.KINEMATIC
     */
    mode: ControlMode;

    /**
     * Slopes steeper than this are not walkable.
     * Unit: radians
     * @default ~0.873 (50°)
     */
    maxSlopeAngle: number;

    /**
     * Highest obstacle the character climbs without jumping.
     * Unit: meters
     * @default 0.3
     */
    stepUpHeight: number;

    /**
     * Ground contacts closer than this count as touching.
     * Unit: meters
     * @default 0.02
     */
    skinWidth: number;

    /**
     * How far below the body the ground probe looks.
     * Unit: meters
     * @default 4 * skinWidth
     */
    groundProbeDistance: number;

    /**
     * A character that was grounded last tick and now finds walkable ground at most this far below
     * is moved down onto it, so walking down ramps and off small ledges keeps it grounded.
     * 0 disables snapping. At most groundProbeDistance.
     * Unit: meters
     * @default groundProbeDistance
     */
    groundSnapDistance: number;

    /**
     * Above this upward speed a body touching walkable ground is airborne, it is leaving the ground.
     * Unit: m/s
     * @default 1.0
     */
    groundedMaxUpwardSpeed: number;

    /**
     * Horizontal acceleration while grounded.
     * Unit: m/s²
     * @default 60
     */
    groundAcceleration: number;

    /**
     * Horizontal acceleration available to steer while airborne.
     * Unit: m/s²
     * @default 15
     */
    airAcceleration: number;

    /**
     * Downward speed applied while grounded to keep contact on uneven ground.
     * Unit: m/s
     * @default 0.5
     */
    groundStickSpeed: number;

    /**
     * How quickly velocity on a steep slope is turned downslope, per radian beyond maxSlopeAngle.
     * @default 4
     */
    slopeSlideFactor: number;

    /**
     * Gravity magnitude, applied along -up.
     * Unit: m/s²
     * @default 9.81
     */
    gravity: number;

    /**
     * Maximum falling speed.
     * Unit: m/s
     * @default 50
     */
    terminalVelocity: number;

    /**
     * Upward speed set on jump.
     * Unit: m/s
     * @default 6
     */
    jumpVelocity: number;

    /**
     * Grace period after leaving the ground during which a ground jump is still allowed.
     * Unit: seconds
     * @default 0.1
     */
    coyoteTime: number;

    /**
     * How long a jump press is remembered before it can be consumed.
     * Unit: seconds
     * @default 0.1
     */
    jumpBufferTime: number;

    /**
     * Jumps available between landings, the ground jump included.
     * @default 1
     */
    maxJumps: number;

    /** @default 1.6 */
    sprintSpeedMultiplier: number;

    /** @default 0.5 */
    crouchSpeedMultiplier: number;

    /**
     * Height above the foot of the forward step probe ray.
     * Unit: meters
     * @default 0.05
     */
    stepProbeHeight: number;

    /**
     * Minimum forward reach of the step probe, used at low speeds.
     * Unit: meters
     * @default 0.02
     */
    minStepForward: number;

    /**
     * How far past the obstacle face the step top is sampled.
     * Unit: meters
     * @default 0.05
     */
    stepForwardTest: number;
};

const DEFAULT_SKIN_WIDTH = 0.02;

export function createControllerSettings(partial: Partial<ControllerSettings> = {}): ControllerSettings {
    const skinWidth = partial.skinWidth ?? DEFAULT_SKIN_WIDTH;

    const groundProbeDistance = partial.groundProbeDistance ?? 4 * skinWidth;

    return {
        mode: ControlMode.KINEMATIC,
        maxSlopeAngle: (50 * Math.PI) / 180,
        stepUpHeight: 0.3,
        groundedMaxUpwardSpeed: 1.0,
        groundAcceleration: 60,
        airAcceleration: 15,
        groundStickSpeed: 0.5,
        slopeSlideFactor: 4,
        gravity: 9.81,
        terminalVelocity: 50,
        jumpVelocity: 6,
        coyoteTime: 0.1,
        jumpBufferTime: 0.1,
        maxJumps: 1,
        sprintSpeedMultiplier: 1.6,
        crouchSpeedMultiplier: 0.5,
        stepProbeHeight: 0.05,
        minStepForward: 0.02,
        stepForwardTest: 0.05,
        ...partial,
        skinWidth,
        groundProbeDistance,
        groundSnapDistance: partial.groundSnapDistance ?? groundProbeDistance,
    };
}

/**
 * Applies `partial` over `base`. A new skinWidth without a groundProbeDistance re-derives the probe distance,
 * a new probe distance without a groundSnapDistance re-derives the snap distance.
 */
export function mergeControllerSettings(base: ControllerSettings, partial: Partial<ControllerSettings>): ControllerSettings {
    const { groundProbeDistance, groundSnapDistance, ...rest } = base;
    const keepProbeDistance = partial.skinWidth === undefined;
    const keepSnapDistance = keepProbeDistance && partial.groundProbeDistance === undefined;
    return createControllerSettings({
        ...rest,
        ...(keepProbeDistance ? { groundProbeDistance } : {}),
        ...(keepSnapDistance ? { groundSnapDistance } : {}),
        ...partial,
    });
}

const NON_NEGATIVE_SETTINGS = [
    'stepUpHeight',
    'groundedMaxUpwardSpeed',
    'groundAcceleration',
    'airAcceleration',
    'groundStickSpeed',
    'slopeSlideFactor',
    'gravity',
    'jumpVelocity',
    'coyoteTime',
    'jumpBufferTime',
    'sprintSpeedMultiplier',
    'crouchSpeedMultiplier',
    'stepProbeHeight',
    'minStepForward',
    'stepForwardTest',
] as const satisfies ReadonlyArray<keyof ControllerSettings>;

/**
 * Throws an INVALID_CONFIGURATION ControllerError for impossible settings.
 */
export function validateControllerSettings(settings: ControllerSettings): void {
    if (
        settings.mode !== ControlMode.KINEMATIC &&
        settings.mode !== ControlMode.VELOCITY &&
        settings.mode !== ControlMode.FORCE &&
        settings.mode !== ControlMode.IMPULSE
    ) {
        throw invalidConfiguration(`unknown control mode ${settings.mode}`);
    }

    for (const key of NON_NEGATIVE_SETTINGS) {
        const value = settings[key];
        if (!Number.isFinite(value) || value < 0) {
            throw invalidConfiguration(`${key} must be a finite number >= 0, got ${value}`);
        }
    }

    if (!Number.isFinite(settings.maxSlopeAngle) || settings.maxSlopeAngle <= 0 || settings.maxSlopeAngle >= Math.PI / 2) {
        throw invalidConfiguration(`maxSlopeAngle must be in (0, π/2), got ${settings.maxSlopeAngle}`);
    }

    if (!Number.isFinite(settings.skinWidth) || settings.skinWidth <= 0) {
        throw invalidConfiguration(`skinWidth must be > 0, got ${settings.skinWidth}`);
    }

    if (!Number.isFinite(settings.groundProbeDistance) || settings.groundProbeDistance < settings.skinWidth) {
        throw invalidConfiguration(
            `groundProbeDistance must be >= skinWidth (${settings.skinWidth}), got ${settings.groundProbeDistance}`,
        );
    }

    if (
        !Number.isFinite(settings.groundSnapDistance) ||
        settings.groundSnapDistance < 0 ||
        settings.groundSnapDistance > settings.groundProbeDistance
    ) {
        throw invalidConfiguration(
            `groundSnapDistance must be in [0, groundProbeDistance (${settings.groundProbeDistance})], got ${settings.groundSnapDistance}`,
        );
    }

    if (!Number.isFinite(settings.terminalVelocity) || settings.terminalVelocity <= 0) {
        throw invalidConfiguration(`terminalVelocity must be > 0, got ${settings.terminalVelocity}`);
    }

    if (!Number.isInteger(settings.maxJumps) || settings.maxJumps < 0) {
        throw invalidConfiguration(`maxJumps must be a non-negative integer, got ${settings.maxJumps}`);
    }
}
