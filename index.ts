export * from './types';
export * from './config';
export * from './services/errors';
export { configureLogger, createLogger, resetLogger, type Logger, type LogLevel, type LogSink } from './services/logger';
export { GeminiGateway, createGeminiClient, type GenerateContentClient, type ModelGateway } from './services/geminiService';
export {
  NotionWorkspace,
  createNotionClient,
  toNotionBlock,
  type NotionApi,
  type NotionBlockRequest,
  type WorkspaceClient,
} from './services/notionService';
export { buildSystemInstruction, SLIDE_INSTRUCTION, SUMMARY_INSTRUCTION, SYSTEM_PROMPT_TEMPLATE } from './services/prompts';
export { loadSlidesFromDirectory, parseSlideSelection } from './services/slideLoader';
export { ConversationState } from './utils/conversationState';
export { parseExplanation, parseSpans } from './utils/explanationParser';
export { parseSlideResponse, parseSummaryResponse } from './utils/parsers';
export { batchBlocks, compile, lowerNodes, splitText } from './utils/blockCompiler';
export { runWithRetry, withTimeout, type RetryOptions } from './utils/retry';
export { LecturePipeline, pipelineReducer, type LecturePipelineOptions, type PipelineState } from './pipeline/lecturePipeline';
export { UploadCoordinator } from './pipeline/uploadCoordinator';
export { buildLectureReport, formatLectureReport } from './pipeline/report';
