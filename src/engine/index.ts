export {ProcessExecutor, type LogLine, type OnLogLine} from './executor.js'
export {ExecaProcessExecutor} from './execa-executor.js'
export type {ProcessRequest, ProcessResult} from './types.js'
