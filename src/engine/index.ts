export {ImageEngine, type LogLine, type OnLogLine} from './engine.js'
export {DockerCliEngine, dockerCliEnv, dockerBuildArgs, parseImageInspect} from './docker-engine.js'
export type {BuildImageRequest, EphemeralContainerRequest, ImageConfig, ImageInfo, ProcessExit} from './types.js'
