import type { BodyRef } from './backend/backend';

/** kinds of failure the controller reports */
export enum ControllerErrorKind {
    /** the body no longer exists in the physics world, the tick is skipped for that character */
    BODY_NOT_FOUND = 0,
    /** a backend query was rejected (degenerate shape, non-finite input), the adjustment it served is skipped */
    QUERY_FAILED = 1,
    /** settings or body geometry are impossible, creation of the character fails */
    INVALID_CONFIGURATION = 2,
}

export type ControllerErrorDetails = {
    /** character the error belongs to, when known */
    characterId?: number;
    /** backend body the error belongs to, when known */
    bodyRef?: BodyRef;
    /** underlying error, for unexpected exceptions */
    cause?: unknown;
};

export class ControllerError extends Error {
    readonly kind: ControllerErrorKind;
    readonly characterId: number | undefined;
    readonly bodyRef: BodyRef | undefined;

    constructor(kind: ControllerErrorKind, message: string, details: ControllerErrorDetails = {}) {
        super(message, details.cause === undefined ? undefined : { cause: details.cause });
        this.name = 'ControllerError';
        this.kind = kind;
        this.characterId = details.characterId;
        this.bodyRef = details.bodyRef;
    }
}

export function bodyNotFound(bodyRef: BodyRef, characterId?: number): ControllerError {
    return new ControllerError(ControllerErrorKind.BODY_NOT_FOUND, `body ${bodyRef} not found in physics world`, {
        bodyRef,
        characterId,
    });
}

export function queryFailed(what: string, bodyRef: BodyRef, characterId?: number): ControllerError {
    return new ControllerError(ControllerErrorKind.QUERY_FAILED, `${what} query failed for body ${bodyRef}`, {
        bodyRef,
        characterId,
    });
}

export function invalidConfiguration(message: string): ControllerError {
    return new ControllerError(ControllerErrorKind.INVALID_CONFIGURATION, `invalid configuration: ${message}`);
}

/** wraps anything thrown during a tick so it can be stored on the character */
export function toControllerError(error: unknown, characterId: number, bodyRef: BodyRef): ControllerError {
    if (error instanceof ControllerError) {
        return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new ControllerError(ControllerErrorKind.QUERY_FAILED, `unexpected failure for body ${bodyRef}: ${message}`, {
        characterId,
        bodyRef,
        cause: error,
    });
}

/** exhaustiveness check for switches over enums */
export function assertNever(value: never, message: string): never {
    throw new Error(`${message}: ${String(value)}`);
}
