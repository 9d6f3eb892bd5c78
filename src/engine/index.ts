export {StagingArea} from './staging-area.js'
export {DependencyResolver, type LogLine, type OnLogLine} from './resolver.js'
export {GalaxyCliResolver, DEFAULT_RESOLVER_COMMAND} from './galaxy-resolver.js'
export type {ResolveRequest, ResolveResult} from './types.js'
