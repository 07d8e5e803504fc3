export { planOutputTree, pluginDirectoryName } from './output-tree.js';
export { GitRepositoryInitializer, type RepositoryInitializer } from './repository.js';
export {
  PluginEmitter,
  type EmitResult,
  type PluginEmitterOptions,
  type RepositoryOutcome,
} from './plugin-emitter.js';
