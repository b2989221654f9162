export { ComponentRegistry, defaultRegistry } from './registry.js';
export { COMPONENT_DEFINITIONS } from './definitions.js';
