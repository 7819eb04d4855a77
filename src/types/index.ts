// Action metadata types
export * from './metadata.types';

// Commit types
export * from './commit.types';

// Configuration types
export * from './config.types';

// Context and runtime types
export * from './context.types';

// Node:child_process types
export * from './node-child-process.types';

// Rule plugin types
export * from './rule.types';
