export {
  SpawnError,
  spawnAsync,
  type SpawnResult,
} from './utils/spawn-utils';
