// Types
export * from './types';

// Controller
export { PrinterController, ControllerState, ControllerOptions } from './controller/PrinterController';

// Transports
export * from './connections';

// Operations
export * from './operations';

// Safety
export { SafetySystem } from './safety/SafetySystem';
export { envelopeExtremes, ZERO_ENVELOPE } from './safety/envelope';
export { ISafetySystem, ValidationResult, PointCheckOptions } from './interfaces/SafetySystem';

// Configuration
export { createPrinterConfig, loadConfigFile, configFromEnv, mergeConfig, DEFAULT_CONFIG } from './config';

// Command templates
export * as commands from './gcode/commands';

// Utilities
export { LimitsCache } from './state/limits-cache';
export { Logger } from './utils/logger';
export { ErrorHandler, PrinterError } from './utils/error-handler';
export { Clock, systemClock, pollUntil } from './utils/poll';
