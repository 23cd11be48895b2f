/** @module groundwork */

export * from './backend/backend';
export type { SlideSettings, SweepFn } from './backend/slide';
export * as slide from './backend/slide';
export type { ShapeCache } from './backend/shape-cache';
export * as shapeCache from './backend/shape-cache';
export type { CrashcatBackendSettings } from './backend/crashcat';
export * as crashcatBackend from './backend/crashcat';
export type { RapierBackendSettings } from './backend/rapier';
export * as rapierBackend from './backend/rapier';

export * from './settings';
export * from './body';
export * from './errors';
export * from './logger';

export * from './ground/ground-info';
export * from './ground/ground-probe';

export * from './jump/jump-state';

export * from './movement/output';
export * from './movement/step-up';
export * from './movement/resolver';

export * from './character/character-id';
export type { Character, CharacterSystem, CharacterSystemOptions } from './character/character-system';
export { StepStatus } from './character/character-system';
export * as characterSystem from './character/character-system';

export * from './input/intent';
export type { Look, LookSettings } from './input/look';
export * as look from './input/look';

export type { FixedStep, FixedStepSettings } from './fixed-step';
export * as fixedStep from './fixed-step';
