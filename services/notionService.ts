import { Client } from '@notionhq/client';
import { z } from 'zod';
import type { DocumentBlock, RichTextRun, Slide } from '../types';
import { createLogger } from './logger';

const log = createLogger('Notion');

// ======================================================================================
// BLOCK SERIALISATION
// ======================================================================================

export type RichTextRequest =
  | { type: 'text'; text: { content: string }; annotations: { bold: boolean } }
  | { type: 'equation'; equation: { expression: string } };

interface TextContent<Child> {
  rich_text: RichTextRequest[];
  children?: Child[];
}

// Block request shapes for one nesting level; `Child` is the level below.
type BlockRequestOf<Child> =
  | { object: 'block'; type: 'paragraph'; paragraph: TextContent<Child> }
  | { object: 'block'; type: 'heading_1'; heading_1: TextContent<Child> }
  | { object: 'block'; type: 'heading_2'; heading_2: TextContent<Child> }
  | { object: 'block'; type: 'heading_3'; heading_3: TextContent<Child> }
  | { object: 'block'; type: 'bulleted_list_item'; bulleted_list_item: TextContent<Child> }
  | { object: 'block'; type: 'numbered_list_item'; numbered_list_item: TextContent<Child> }
  | { object: 'block'; type: 'equation'; equation: { expression: string } }
  | { object: 'block'; type: 'image'; image: { type: 'file_upload'; file_upload: { id: string } } }
  | { object: 'block'; type: 'divider'; divider: Record<string, never> };

// One append request carries at most two levels of children.
export type NotionLeafRequest = BlockRequestOf<never>;
export type NotionChildRequest = BlockRequestOf<NotionLeafRequest>;
export type NotionBlockRequest = BlockRequestOf<NotionChildRequest>;

const toRichText = (run: RichTextRun): RichTextRequest =>
  run.type === 'text'
    ? { type: 'text', text: { content: run.content }, annotations: { bold: run.bold } }
    : { type: 'equation', equation: { expression: run.expression } };

const serialise = <Child>(
  block: DocumentBlock,
  toChild: (child: DocumentBlock) => Child,
): BlockRequestOf<Child> => {
  switch (block.kind) {
    case 'equation':
      return { object: 'block', type: 'equation', equation: { expression: block.expression } };
    case 'image':
      return {
        object: 'block',
        type: 'image',
        image: { type: 'file_upload', file_upload: { id: block.fileUploadId } },
      };
    case 'divider':
      return { object: 'block', type: 'divider', divider: {} };
  }

  const content: TextContent<Child> = { rich_text: block.runs.map(toRichText) };
  if (block.children.length > 0) content.children = block.children.map(toChild);
  switch (block.kind) {
    case 'paragraph':
      return { object: 'block', type: 'paragraph', paragraph: content };
    case 'heading_1':
      return { object: 'block', type: 'heading_1', heading_1: content };
    case 'heading_2':
      return { object: 'block', type: 'heading_2', heading_2: content };
    case 'heading_3':
      return { object: 'block', type: 'heading_3', heading_3: content };
    case 'bulleted_list_item':
      return { object: 'block', type: 'bulleted_list_item', bulleted_list_item: content };
    case 'numbered_list_item':
      return { object: 'block', type: 'numbered_list_item', numbered_list_item: content };
  }
};

const toLeafBlock = (block: DocumentBlock): NotionLeafRequest =>
  serialise(block, () => {
    throw new Error('Block nesting exceeds the two levels one append request allows.');
  });

const toChildBlock = (block: DocumentBlock): NotionChildRequest => serialise(block, toLeafBlock);

/**
 * Serialises a document block into the request shape of Notion's append endpoint.
 */
export const toNotionBlock = (block: DocumentBlock): NotionBlockRequest => serialise(block, toChildBlock);

// ======================================================================================
// WORKSPACE CLIENT
// ======================================================================================

export interface WorkspaceClient {
  /** Uploads one slide image and returns the file-upload id an image block can reference. */
  uploadImage(slide: Slide): Promise<string>;
  /** Appends blocks under `pageId` and returns the ids of the created top-level blocks. */
  appendBlocks(pageId: string, blocks: DocumentBlock[]): Promise<string[]>;
}

// The subset of the Notion SDK the workspace client calls.
export interface NotionApi {
  fileUploads: {
    create(args: { mode: 'single_part'; filename: string; content_type: string }): Promise<{ id: string }>;
    send(args: { file_upload_id: string; file: { filename: string; data: Blob } }): Promise<unknown>;
  };
  blocks: {
    children: {
      append(args: { block_id: string; children: NotionBlockRequest[] }): Promise<object>;
    };
  };
}

const AppendResponseSchema = z.object({
  results: z.array(z.object({ id: z.string() })),
});

export const createNotionClient = (apiKey: string): NotionApi => new Client({ auth: apiKey });

export class NotionWorkspace implements WorkspaceClient {
  constructor(private readonly api: NotionApi) {}

  async uploadImage(slide: Slide): Promise<string> {
    const upload = await this.api.fileUploads.create({
      mode: 'single_part',
      filename: slide.fileName,
      content_type: slide.mimeType,
    });
    await this.api.fileUploads.send({
      file_upload_id: upload.id,
      file: { filename: slide.fileName, data: new Blob([slide.image], { type: slide.mimeType }) },
    });
    log.debug(`Uploaded ${slide.fileName} as ${upload.id}.`);
    return upload.id;
  }

  async appendBlocks(pageId: string, blocks: DocumentBlock[]): Promise<string[]> {
    const response = await this.api.blocks.children.append({
      block_id: pageId,
      children: blocks.map(toNotionBlock),
    });
    const parsed = AppendResponseSchema.safeParse(response);
    if (!parsed.success) {
      // The append went through; only the id echo is unreadable.
      log.warn(`Append response for page ${pageId} had no readable block ids.`);
      return [];
    }
    return parsed.data.results.map((result) => result.id);
  }
}
