export { nestOutline, placeLevel } from './level-placement';
export type { LevelPlacement } from './level-placement';
export { OutlineTreeBuilder } from './outline-tree-builder';
