import { GroundState } from '../ground/ground-info';
import type { ControllerSettings } from '../settings';

/** jump phase of a character */
export enum JumpPhase {
    /** standing on walkable ground */
    GROUNDED = 0,
    /** just left the ground, the ground jump is still available */
    COYOTE = 1,
    /** in the air */
    AIRBORNE = 2,
}

/** per-character jump and gravity state, persists across ticks and resets on landing */
export type JumpState = {
    phase: JumpPhase;
    /** rising from a jump since the last landing */
    jumping: boolean;
    /** seconds since the character last stood on walkable ground */
    timeSinceGrounded: number;
    /** seconds since the last jump press */
    timeSinceJumpRequest: number;
    /** the last jump press was used */
    jumpConsumed: boolean;
    /** jumps left before landing */
    jumpsRemaining: number;
    /** vertical speed, positive up. Unit: m/s */
    verticalVelocity: number;
    /** a jump launched during the last update */
    jumpedThisTick: boolean;
};

/** a new character starts in the air with its ground jump spent */
export function createJumpState(settings: ControllerSettings): JumpState {
    return {
        phase: JumpPhase.AIRBORNE,
        jumping: false,
        timeSinceGrounded: Number.POSITIVE_INFINITY,
        timeSinceJumpRequest: Number.POSITIVE_INFINITY,
        jumpConsumed: true,
        jumpsRemaining: Math.max(0, settings.maxJumps - 1),
        verticalVelocity: 0,
        jumpedThisTick: false,
    };
}

/**
 * Advances the jump state by one tick.
 *
 * @param groundState classification from this tick's ground probe
 * @param jumpPressed whether jump was pressed this tick
 * @param dt tick length in seconds
 */
export function updateJumpState(
    state: JumpState,
    groundState: GroundState,
    jumpPressed: boolean,
    settings: ControllerSettings,
    dt: number,
): void {
    state.jumpedThisTick = false;

    // jump buffer
    if (jumpPressed) {
        state.timeSinceJumpRequest = 0;
        state.jumpConsumed = false;
    } else {
        state.timeSinceJumpRequest += dt;
    }

    if (groundState === GroundState.GROUNDED && state.verticalVelocity <= 0) {
        // landed
        state.phase = JumpPhase.GROUNDED;
        state.jumping = false;
        state.timeSinceGrounded = 0;
        state.jumpsRemaining = settings.maxJumps;
        state.verticalVelocity = 0;
    } else {
        if (state.phase === JumpPhase.GROUNDED) {
            state.phase = JumpPhase.COYOTE;
            state.timeSinceGrounded = 0;
        }
        state.timeSinceGrounded += dt;

        if (state.phase === JumpPhase.COYOTE && state.timeSinceGrounded > settings.coyoteTime) {
            state.phase = JumpPhase.AIRBORNE;
            // the ground jump is gone once the grace period ends
            state.jumpsRemaining = Math.min(state.jumpsRemaining, Math.max(0, settings.maxJumps - 1));
        }
    }

    const requestLive = !state.jumpConsumed && state.timeSinceJumpRequest <= settings.jumpBufferTime;
    if (requestLive && state.jumpsRemaining > 0) {
        state.verticalVelocity = settings.jumpVelocity;
        state.jumpsRemaining -= 1;
        state.phase = JumpPhase.AIRBORNE;
        state.jumping = true;
        state.jumpConsumed = true;
        state.jumpedThisTick = true;
    }

    if (state.phase !== JumpPhase.GROUNDED && !state.jumpedThisTick) {
        state.verticalVelocity = Math.max(state.verticalVelocity - settings.gravity * dt, -settings.terminalVelocity);
    }
}

/**
 * Puts the jump state into free flight for one tick: airborne, no vertical speed of its own, no jumps.
 * Landing after flight goes through updateJumpState as usual.
 */
export function setFlying(state: JumpState, settings: ControllerSettings, dt: number): void {
    state.phase = JumpPhase.AIRBORNE;
    state.jumping = false;
    state.jumpedThisTick = false;
    state.verticalVelocity = 0;
    state.timeSinceGrounded += dt;
    state.timeSinceJumpRequest = Number.POSITIVE_INFINITY;
    state.jumpConsumed = true;
    state.jumpsRemaining = Math.min(state.jumpsRemaining, Math.max(0, settings.maxJumps - 1));
}

/** whether the ground jump can still be taken this tick */
export function canGroundJump(state: JumpState): boolean {
    return (state.phase === JumpPhase.GROUNDED || state.phase === JumpPhase.COYOTE) && state.jumpsRemaining > 0;
}
