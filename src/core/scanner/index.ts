export { type ScanAdapter, type ToolReport, createAdapter } from './adapter.js'
export {
  type ReportExtractor,
  type ReportFormat,
  ReportParseError,
  getExtractor,
  normalizedExtractor,
  sarifExtractor,
  sarifSeverity
} from './extractors.js'
export { CommandScanAdapter, substituteArgs, type CommandDefinition } from './command.js'
export {
  type ReportStore,
  type RawReportEntry,
  FileReportStore,
  InMemoryReportStore
} from './store.js'
export { ScanRunner, type ScanRunnerOptions } from './runner.js'
export { ScanAggregator, classify, stageOf, type AggregateResult } from './aggregator.js'
export { tasksForStage, commandAdapters } from './tasks.js'
