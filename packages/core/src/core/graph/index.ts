export { DependencyGraph, getDependencyGraph } from './dependency-graph.js';
