import { z } from 'zod';
import { createChildLogger } from '@verity/shared/src/logger.js';

const log = createChildLogger('stream:decoder');

const LOG_PREVIEW_LENGTH = 100;

// Only the path we read is checked; any other field the engine adds is ignored.
const StreamFragmentSchema = z
  .object({
    content: z
      .object({
        parts: z.array(z.unknown()).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const TextPartSchema = z.object({ text: z.string() }).passthrough();

export type DiscardHandler = (line: string, error: Error) => void;

export interface DecodeStreamOptions {
  readonly onDiscard?: DiscardHandler;
}

export interface StreamDecodeResult {
  /** Last non-empty text part of the stream, or "" when there was none. */
  readonly finalText: string;
  readonly candidates: readonly string[];
  readonly parsedFragments: number;
  readonly discardedLines: number;
}

/**
 * Splits a chunked body into lines. A trailing line without a newline is
 * still emitted once the body ends.
 */
export async function* readLines(
  chunks: AsyncIterable<Uint8Array | string> | Iterable<Uint8Array | string>,
): AsyncGenerator<string, void, undefined> {
  const decoder = new TextDecoder();
  let buffer = '';

  for await (const chunk of chunks) {
    buffer += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });

    const lines = buffer.split('\n');
    // Keep the last incomplete line in the buffer
    buffer = lines.pop() ?? '';

    for (const line of lines) {
      yield stripCarriageReturn(line);
    }
  }

  buffer += decoder.decode();
  if (buffer) {
    yield stripCarriageReturn(buffer);
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

export function extractTextParts(fragment: unknown): string[] {
  const parsed = StreamFragmentSchema.safeParse(fragment);
  if (!parsed.success) {
    return [];
  }

  const texts: string[] = [];
  for (const part of parsed.data.content?.parts ?? []) {
    const textPart = TextPartSchema.safeParse(part);
    if (textPart.success && textPart.data.text.length > 0) {
      texts.push(textPart.data.text);
    }
  }
  return texts;
}

export async function decodeStream(
  lines: AsyncIterable<string>,
  options: DecodeStreamOptions = {},
): Promise<StreamDecodeResult> {
  const candidates: string[] = [];
  let parsedFragments = 0;
  let discardedLines = 0;

  for await (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }

    let fragment: unknown;
    try {
      fragment = JSON.parse(trimmed);
    } catch (error) {
      discardedLines++;
      log.debug({ line: trimmed.slice(0, LOG_PREVIEW_LENGTH) }, 'Discarding unparseable stream line');
      options.onDiscard?.(line, error instanceof Error ? error : new Error(String(error)));
      continue;
    }

    parsedFragments++;
    candidates.push(...extractTextParts(fragment));
  }

  const finalText = candidates.at(-1) ?? '';

  log.debug(
    {
      parsedFragments,
      discardedLines,
      candidateCount: candidates.length,
      finalText: finalText.slice(0, LOG_PREVIEW_LENGTH),
    },
    'Stream decoded',
  );

  return { finalText, candidates, parsedFragments, discardedLines };
}
