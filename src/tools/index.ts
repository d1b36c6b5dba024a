export {findExecutable, selectExecutable, type ToolLocator} from './locate.js'
export {selectDownloadSteps, type DownloadOptions} from './download.js'
export {selectCompileStep, defaultCompilers} from './compile.js'
