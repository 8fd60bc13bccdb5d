/**
 * Barrel exports for the output module.
 */

export { isCloseable } from './closeable.js'
export type { Closeable } from './closeable.js'
export {
  createConsoleSink,
  createNullSink,
  tryCreateFileSink,
} from './log-sink.js'
export type { LogSink, ConsoleLogSink, FileLogSink, NullLogSink, FileSinkResult } from './log-sink.js'
export {
  ConsoleInteractor,
  NullInteractor,
  formatSettingQuestion,
} from './interactor.js'
export type { Interactor, NeededSetting, ConsoleInteractorStreams } from './interactor.js'
export { selectOutput, releaseOutput, resolveLogLevel, outputSignature } from './output-selector.js'
export type { OutputSelection, OutputSelectorOptions } from './output-selector.js'
