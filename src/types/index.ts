// Action metadata types
export * from './metadata.types';

// Common types
export * from './common.types';

// Configuration types
export * from './config.types';

// Context and runtime types
export * from './context.types';

// Node:child_process types
export * from './node-child-process.types';

// Repository state types
export * from './repository.types';

// Version decision types
export * from './version.types';
