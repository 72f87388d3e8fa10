export { HeadingClassifier } from './heading-classifier';
export { LevelClusterer } from './level-clusterer';
