import { type BodyRef, isValidShape, type ProbeShape } from './backend/backend';
import { invalidConfiguration } from './errors';

/**
 * The rigid body a character drives. The host owns the body, the controller only keeps the ref.
 */
export type ControlledBody = {
    /** body inside the physics backend */
    ref: BodyRef;
    /** vertical probe shape matching the body's collider */
    shape: ProbeShape;
    /**
     * Body mass, used to turn velocity changes into forces.
     * Unit: kg
     */
    mass: number;
};

/**
 * Throws an INVALID_CONFIGURATION ControllerError for a degenerate shape or a non-positive mass.
 */
export function validateControlledBody(body: ControlledBody): void {
    if (!Number.isFinite(body.ref)) {
        throw invalidConfiguration(`body ref must be a finite number, got ${body.ref}`);
    }
    if (!isValidShape(body.shape)) {
        throw invalidConfiguration(
            `probe shape must have radius > 0 and a valid half height, got radius ${body.shape.radius}, halfHeight ${body.shape.halfHeight}`,
        );
    }
    if (!Number.isFinite(body.mass) || body.mass <= 0) {
        throw invalidConfiguration(`mass must be > 0, got ${body.mass}`);
    }
}
