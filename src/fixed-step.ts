export type FixedStepSettings = {
    /**
     * Fixed tick length.
     * Unit: seconds
     * @default 1/60
     */
    dt: number;
    /**
     * Frame times longer than this are clamped, so a stalled frame does not run away.
     * Unit: seconds
     * @default 0.25
     */
    maxFrameTime: number;
    /**
     * Most ticks run for one frame, leftover time beyond them is dropped.
     * @default 8
     */
    maxSteps: number;
};

export function createFixedStepSettings(): FixedStepSettings {
    return {
        dt: 1 / 60,
        maxFrameTime: 0.25,
        maxSteps: 8,
    };
}

/** frame time accumulator producing whole fixed ticks */
export type FixedStep = {
    settings: FixedStepSettings;
    /** simulation time not yet consumed by a tick */
    accumulator: number;
    /** accumulator / dt after the last advance, for interpolating between the last two ticks */
    alpha: number;
};

export function create(settings: FixedStepSettings = createFixedStepSettings()): FixedStep {
    return {
        settings,
        accumulator: 0,
        alpha: 0,
    };
}

/**
 * Adds frame time and returns how many fixed ticks to run now.
 * @param frameTime seconds since the last frame
 */
export function advance(fixedStep: FixedStep, frameTime: number): number {
    const { dt, maxFrameTime, maxSteps } = fixedStep.settings;

    const clamped = Number.isFinite(frameTime) ? Math.min(Math.max(frameTime, 0), maxFrameTime) : 0;
    fixedStep.accumulator += clamped;

    let steps = Math.floor(fixedStep.accumulator / dt);
    if (steps > maxSteps) {
        steps = maxSteps;
        fixedStep.accumulator = 0;
    } else {
        fixedStep.accumulator -= steps * dt;
    }

    fixedStep.alpha = fixedStep.accumulator / dt;
    return steps;
}

/** advances by `frameTime` and calls `tick` once per fixed tick */
export function run(fixedStep: FixedStep, frameTime: number, tick: (dt: number) => void): number {
    const steps = advance(fixedStep, frameTime);
    for (let i = 0; i < steps; i++) {
        tick(fixedStep.settings.dt);
    }
    return steps;
}
