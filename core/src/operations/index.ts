export { MotionSystem } from './MotionSystem';
export { HomingSystem } from './HomingSystem';
export { ThermalSystem, CHAMBER_CANDIDATES, CHAMBER_CONTROLS, BED_RANGE, CHAMBER_RANGE } from './ThermalSystem';
export * from './types';
