export const AVAILABLE_MODELS = ['gemini-2.5-flash', 'gemini-2.5-pro', 'gemini-3-pro-preview'] as const;

export type ModelName = typeof AVAILABLE_MODELS[number];

export type LogType = 'info' | 'success' | 'warning' | 'error';

export interface LogEntry {
    id: string;
    timestamp: string;
    type: LogType;
    message: string;
}

// --- Slides ---

export interface Slide {
  index: number; // 1-based page number, strictly increasing
  fileName: string;
  mimeType: string;
  image: Uint8Array;
  included: boolean;
}

// --- Conversation ---

export type TurnRole = 'system' | 'user' | 'assistant';

export type TurnPart =
  | { kind: 'text'; text: string }
  | { kind: 'image'; data: Uint8Array; mimeType: string };

export interface ConversationTurn {
  role: TurnRole;
  parts: TurnPart[];
  slideIndex?: number;
}

// --- Explanation AST ---

export type Span =
  | { kind: 'text'; text: string }
  | { kind: 'bold'; text: string }
  | { kind: 'inline_equation'; latex: string };

export type HeadingLevel = 1 | 2 | 3;

export interface ListItem {
  spans: Span[];
  children: ExplanationNode[];
}

export type ExplanationNode =
  | { kind: 'heading'; level: HeadingLevel; spans: Span[] }
  | { kind: 'paragraph'; spans: Span[] }
  | { kind: 'equation'; latex: string; display: 'inline' | 'block' }
  | { kind: 'list'; ordered: boolean; items: ListItem[] };

// --- Document blocks (destination-ready) ---

export type RichTextRun =
  | { type: 'text'; content: string; bold: boolean }
  | { type: 'equation'; expression: string };

export type TextBlockKind =
  | 'heading_1'
  | 'heading_2'
  | 'heading_3'
  | 'paragraph'
  | 'bulleted_list_item'
  | 'numbered_list_item';

export type DocumentBlock =
  | { kind: TextBlockKind; runs: RichTextRun[]; children: DocumentBlock[] }
  | { kind: 'equation'; expression: string }
  | { kind: 'image'; fileUploadId: string }
  | { kind: 'divider' };

export interface StructuralLimits {
  maxBlocksPerRequest: number;
  maxCharsPerRun: number;
  maxCharsPerEquation: number;
  /** Ceiling on any array in a request: a block's rich text and its children. */
  maxArrayLength: number;
  maxNestingDepth: number;
}

// --- Per-slide outcomes ---

export type SlideStage =
  | 'pending'
  | 'image_uploading'
  | 'analyzing'
  | 'parsing'
  | 'compiling'
  | 'appending'
  | 'done'
  | 'failed'
  | 'cancelled';

export type FailureStage = 'image_uploading' | 'analyzing' | 'parsing' | 'compiling' | 'appending';

export type ImageUploadOutcome =
  | { status: 'pending' }
  | { status: 'uploaded'; fileUploadId: string }
  | { status: 'failed'; reason: string }
  | { status: 'cancelled' };

export type ExplanationOutcome =
  | { status: 'pending' }
  | { status: 'success'; batches: DocumentBlock[][] }
  | { status: 'skipped' }
  | { status: 'failed'; stage: FailureStage; reason: string }
  | { status: 'cancelled' };

export type AppendOutcome =
  | { status: 'pending' }
  | { status: 'committed'; blockIds: string[] }
  | { status: 'failed'; reason: string; committedBlockIds: string[] }
  | { status: 'cancelled' };

export interface SlideResult {
  index: number;
  included: boolean;
  stage: SlideStage;
  image: ImageUploadOutcome;
  explanation: ExplanationOutcome;
  append: AppendOutcome;
  failure?: { stage: FailureStage; reason: string };
  startedAt?: number;
  completedAt?: number;
}

export type SectionOutcome =
  | { status: 'committed'; blockIds: string[] }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; reason: string };

export interface LectureReport {
  pageId: string;
  courseName: string;
  slides: SlideResult[];
  summary: SectionOutcome;
  practiceQuestions: SectionOutcome;
  cancelled: boolean;
  succeeded: boolean;
  failedSlides: number[];
}
