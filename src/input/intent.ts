import { type Vec3, vec3 } from 'mathcat';
import { getHorizontalForward, type Look } from './look';

/** what a character wants to do this tick */
export type MovementIntent = {
    /** unit direction, horizontal unless flying, or zero to stand still */
    direction: Vec3;
    /** desired speed along direction. Unit: m/s */
    speed: number;
    /** jump was pressed this tick */
    jump: boolean;
    sprint: boolean;
    crouch: boolean;
    /** free flight: direction may point up or down, gravity, jumping and grounding are skipped */
    fly: boolean;
};

export function createMovementIntent(): MovementIntent {
    return {
        direction: vec3.create(),
        speed: 0,
        jump: false,
        sprint: false,
        crouch: false,
        fly: false,
    };
}

export function copyMovementIntent(out: MovementIntent, intent: MovementIntent): MovementIntent {
    vec3.copy(out.direction, intent.direction);
    out.speed = intent.speed;
    out.jump = intent.jump;
    out.sprint = intent.sprint;
    out.crouch = intent.crouch;
    out.fly = intent.fly;
    return out;
}

/** button state sampled from the host's input devices */
export type InputState = {
    forward: boolean;
    backward: boolean;
    left: boolean;
    right: boolean;
    run: boolean;
    jump: boolean;
    crouch: boolean;
};

export function createInputState(): InputState {
    return {
        forward: false,
        backward: false,
        left: false,
        right: false,
        run: false,
        jump: false,
        crouch: false,
    };
}

export type InputMappingSettings = {
    /**
     * Unit: m/s
     * @default 5
     */
    walkSpeed: number;
    /**
     * Unit: m/s
     * @default 8
     */
    runSpeed: number;
    /**
     * Move along the full look direction, pitch included, without gravity.
     * @default false
     */
    fly: boolean;
};

export function createInputMappingSettings(): InputMappingSettings {
    return {
        walkSpeed: 5,
        runSpeed: 8,
        fly: false,
    };
}

/** turns held buttons into intents, remembering the jump button to report presses only */
export type InputMapping = {
    settings: InputMappingSettings;
    jumpWasDown: boolean;
};

export function createInputMapping(settings: InputMappingSettings = createInputMappingSettings()): InputMapping {
    return {
        settings,
        jumpWasDown: false,
    };
}

const _toIntent_forward = /* @__PURE__ */ vec3.create();
const _toIntent_right = /* @__PURE__ */ vec3.create();

/**
 * Maps button state and look direction to a movement intent.
 * Movement is relative to the look yaw, pitch is ignored unless the mapping flies.
 */
export function toIntent(out: MovementIntent, mapping: InputMapping, input: InputState, look: Look): MovementIntent {
    const { fly } = mapping.settings;
    if (fly) {
        vec3.copy(_toIntent_forward, look.forward);
        vec3.copy(_toIntent_right, look.right);
    } else {
        getHorizontalForward(_toIntent_forward, look);
        vec3.set(_toIntent_right, look.right[0], 0, look.right[2]);
    }

    vec3.set(out.direction, 0, 0, 0);
    if (input.forward) vec3.add(out.direction, out.direction, _toIntent_forward);
    if (input.backward) vec3.subtract(out.direction, out.direction, _toIntent_forward);
    if (input.right) vec3.add(out.direction, out.direction, _toIntent_right);
    if (input.left) vec3.subtract(out.direction, out.direction, _toIntent_right);

    const length = vec3.length(out.direction);
    if (length > 1e-3) {
        vec3.scale(out.direction, out.direction, 1 / length);
        out.speed = input.run ? mapping.settings.runSpeed : mapping.settings.walkSpeed;
    } else {
        vec3.set(out.direction, 0, 0, 0);
        out.speed = 0;
    }

    out.jump = input.jump && !mapping.jumpWasDown;
    mapping.jumpWasDown = input.jump;

    // run already picks the speed
    out.sprint = false;
    out.crouch = input.crouch;
    out.fly = fly;

    return out;
}
