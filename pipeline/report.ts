import type { LectureReport, SectionOutcome, SlideResult } from '../types';

export interface LectureReportInput {
  pageId: string;
  courseName: string;
  slides: SlideResult[];
  summary: SectionOutcome;
  practiceQuestions: SectionOutcome;
  cancelled: boolean;
}

export const buildLectureReport = (input: LectureReportInput): LectureReport => {
  const slides = [...input.slides].sort((a, b) => a.index - b.index);
  const failedSlides = slides.filter((slide) => slide.stage === 'failed').map((slide) => slide.index);
  const sectionFailed = input.summary.status === 'failed' || input.practiceQuestions.status === 'failed';
  return {
    ...input,
    slides,
    failedSlides,
    succeeded: !input.cancelled && failedSlides.length === 0 && !sectionFailed,
  };
};

const describeSlide = (slide: SlideResult): string => {
  const excluded = slide.included ? '' : ' (excluded)';
  if (slide.stage === 'failed' && slide.failure) {
    return `Slide ${slide.index}: failed at ${slide.failure.stage}: ${slide.failure.reason}`;
  }
  if (slide.stage === 'done' && slide.append.status === 'committed') {
    return `Slide ${slide.index}: done, ${slide.append.blockIds.length} blocks${excluded}`;
  }
  return `Slide ${slide.index}: ${slide.stage}${excluded}`;
};

const describeSection = (label: string, outcome: SectionOutcome): string => {
  switch (outcome.status) {
    case 'committed':
      return `${label}: committed, ${outcome.blockIds.length} blocks`;
    case 'skipped':
      return `${label}: skipped (${outcome.reason})`;
    case 'failed':
      return `${label}: failed (${outcome.reason})`;
  }
};

/**
 * Human-readable report: one line per slide, the two closing sections, then
 * every failed slide called out by index, stage and reason.
 */
export const formatLectureReport = (report: LectureReport): string => {
  const lines = [`Lecture "${report.courseName}" → page ${report.pageId}`];
  lines.push(...report.slides.map((slide) => `  ${describeSlide(slide)}`));
  lines.push(describeSection('Summary', report.summary));
  lines.push(describeSection('Practice questions', report.practiceQuestions));

  if (report.failedSlides.length > 0) {
    lines.push(`Failed slides (${report.failedSlides.length}):`);
    for (const slide of report.slides) {
      if (slide.stage !== 'failed') continue;
      const failure = slide.failure ?? { stage: 'appending', reason: 'unknown failure' };
      lines.push(`  - slide ${slide.index} [${failure.stage}] ${failure.reason}`);
    }
  }

  const verdict = report.cancelled ? 'cancelled' : report.succeeded ? 'succeeded' : 'completed with failures';
  lines.push(`Result: ${verdict}`);
  return lines.join('\n');
};
