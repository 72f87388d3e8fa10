export {
  CliError,
  EditorError,
  OutputPathCollisionError,
  UsageError,
} from './cli-error';
