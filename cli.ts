#!/usr/bin/env -S npx tsx
/**
 * Command-line front end for the lecture pipeline.
 *
 * Usage:
 *   lecture-notes --course "Machine Learning" --slides ./out/lecture-04 --exclude 1,12-14
 *
 * The slides directory holds the rasterizer's page images (page_1.jpg, page_2.jpg, ...).
 * Credentials and limits come from the environment; see config.ts.
 */

import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import { discoverCourses, loadConfig, resolveCoursePageId } from './config';
import { LecturePipeline } from './pipeline/lecturePipeline';
import { formatLectureReport } from './pipeline/report';
import { ConfigError, describeError } from './services/errors';
import { createGeminiClient, GeminiGateway } from './services/geminiService';
import { configureLogger, createLogger } from './services/logger';
import { createNotionClient, NotionWorkspace } from './services/notionService';
import { buildSystemInstruction } from './services/prompts';
import { loadSlidesFromDirectory, parseSlideSelection } from './services/slideLoader';

const log = createLogger('CLI');

export interface CliArgs {
  course: string;
  slidesDir: string;
  exclude: Set<number>;
  instruction?: string;
}

export const parseCliArgs = (argv: string[], env: Record<string, string | undefined> = process.env): CliArgs => {
  const { values } = parseArgs({
    args: argv,
    options: {
      course: { type: 'string' },
      slides: { type: 'string' },
      exclude: { type: 'string' },
      instruction: { type: 'string' },
    },
    strict: true,
  });

  const issues: string[] = [];
  if (!values.course) {
    const known = discoverCourses(env);
    issues.push(`--course is required${known.length > 0 ? ` (configured: ${known.join(', ')})` : ''}`);
  }
  if (!values.slides) issues.push('--slides is required');
  if (!values.course || !values.slides) throw new ConfigError(issues);

  return {
    course: values.course,
    slidesDir: values.slides,
    exclude: parseSlideSelection(values.exclude ?? ''),
    instruction: values.instruction?.trim() || undefined,
  };
};

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  const config = loadConfig(process.env);
  configureLogger({ level: config.logLevel });

  const pageId = resolveCoursePageId(args.course, process.env);
  const slides = await loadSlidesFromDirectory(args.slidesDir, args.exclude);
  if (slides.length === 0) {
    throw new ConfigError([`--slides: no slide images found in ${args.slidesDir}`]);
  }

  const controller = new AbortController();
  process.on('SIGINT', () => {
    if (controller.signal.aborted) process.exit(130);
    log.warn('Interrupted. Finishing in-flight requests; press Ctrl+C again to quit immediately.');
    controller.abort();
  });

  const gateway = new GeminiGateway(createGeminiClient(config.geminiApiKey), {
    model: config.model,
    summaryModel: config.summaryModel,
    retry: config.retry,
    requestTimeoutMs: config.requestTimeoutMs,
    replayImages: config.replayImages,
    slideInstruction: args.instruction,
  });
  const workspace = new NotionWorkspace(createNotionClient(config.notionApiKey));

  const pipeline = new LecturePipeline(
    { gateway, workspace },
    {
      pageId,
      courseName: args.course,
      systemInstruction: buildSystemInstruction(args.course),
      slideInstruction: args.instruction,
      limits: config.limits,
      retry: config.retry,
      uploadConcurrency: config.uploadConcurrency,
      contextWarningTurns: config.contextWarningTurns,
      onUpdate: (slide) => log.debug(`Slide ${slide.index} → ${slide.stage}`),
    },
  );

  log.info(`Processing ${slides.length} slides for "${args.course}" with ${config.model}.`);
  const report = await pipeline.run(slides, { signal: controller.signal });
  console.log(formatLectureReport(report));
  process.exitCode = report.succeeded ? 0 : 1;
}

const invokedDirectly = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (invokedDirectly) {
  main().catch((error: unknown) => {
    log.error(describeError(error));
    process.exitCode = 1;
  });
}
