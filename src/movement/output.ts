import { type Vec3, vec3 } from 'mathcat';
import { ControlMode } from '../settings';

/** what the resolver hands to the backend for one tick */
export type MovementOutput = {
    mode: ControlMode;
    /** resolved velocity. Unit: m/s */
    velocity: Vec3;
    /** displacement (KINEMATIC), velocity (VELOCITY), force (FORCE) or impulse (IMPULSE) */
    vector: Vec3;
    /** upward displacement applied before the motion, 0 when not stepping */
    stepUp: number;
    /** horizontal motion into an obstacle was removed */
    blocked: boolean;
};

export function createMovementOutput(): MovementOutput {
    return {
        mode: ControlMode.KINEMATIC,
        velocity: vec3.create(),
        vector: vec3.create(),
        stepUp: 0,
        blocked: false,
    };
}

export function resetMovementOutput(output: MovementOutput, mode: ControlMode): void {
    output.mode = mode;
    vec3.set(output.velocity, 0, 0, 0);
    vec3.set(output.vector, 0, 0, 0);
    output.stepUp = 0;
    output.blocked = false;
}
