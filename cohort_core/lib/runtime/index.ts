export { ConsoleRunLogSink, InMemoryRunLogSink, SessionRunLogger, toLogError, truncate } from './runLogging';
export type {
    RunLogSink,
    SessionStage,
    SinkWriteReport,
    StageTerminalStatus,
    TaskLogDocument,
    TaskLogError,
    TaskStatus,
} from './runLogging';
