export * from './app/core/tree-map.config';
export * from './app/core/shape-violation.error';
export * from './app/models/tree-node.model';
export * from './app/models/tree-node';
export * from './app/models/tree-map';
export * from './app/models/tree-snapshot';
export * from './app/services/tree-printer';
export * from './app/services/disk-usage';
export * from './app/services/archive.service';
export * from './app/services/tree-workspace.service';
export { createDemoTree, createDemoDiskTree } from './app/seeds/demo-tree.seed';
