// Entities
export * from './entities/LocationMode.js';
export * from './entities/Zone.js';
export * from './entities/LightTarget.js';
export * from './entities/GeneratorInput.js';
export * from './entities/AutomationPackage.js';
export * from './entities/Entity.js';

// Errors
export * from './errors/GenerationError.js';

// Mode logic
export * from './mode/ModeStateMachine.js';

// Ports
export type { ILogger, LogData, LogLevel } from './ports/ILogger.js';
export type { IPackagePublisher, PublishResult } from './ports/IPackagePublisher.js';
export type { ISettingsStore, RawSettings } from './ports/ISettingsStore.js';
