import { InvalidArgumentError } from '../../utils/errors.js';
import { styleCatalog, type StyleCatalog, type StyleDefinition, type StyleId } from '../styles/catalog.js';

export type PromptMetadata = {
  /** The style argument as received, or null when absent. */
  requestedStyle: string | null;
  resolvedStyle: StyleId;
  /** True when a non-blank requested style was not recognized and the default was used. */
  fellBack: boolean;
  topic: string;
  length: number;
};

export interface PromptResult {
  text: string;
  metadata: PromptMetadata;
}

export interface StyleSummary {
  id: StyleId;
  description: string;
}

export interface PromptBuilder {
  buildPrompt(topic: string, style?: string | null): PromptResult;
  listAvailableStyles(): StyleSummary[];
}

export function composePromptText(topic: string, style: StyleDefinition): string {
  return `You are an expert comedian who specializes in ${style.name} jokes.

TECHNIQUE: ${style.technique}

TOPIC: ${topic}

Rules:
- Write exactly one dad joke about the topic above.
- Keep it appropriate for a workplace: wholesome, family-friendly, no profanity, no insults.
- ${style.format}

Respond with ONLY the joke text, nothing else.`;
}

export function createPromptBuilder(catalog: StyleCatalog = styleCatalog): PromptBuilder {
  return {
    buildPrompt(topic: string, style?: string | null): PromptResult {
      const trimmedTopic = typeof topic === 'string' ? topic.trim() : '';
      if (!trimmedTopic) throw new InvalidArgumentError('topic');

      const resolved = catalog.resolveStyle(style);
      const requested = style ?? null;
      const fellBack = requested !== null && requested.trim() !== '' && !catalog.findStyle(requested);

      const text = composePromptText(trimmedTopic, resolved);

      return {
        text,
        metadata: {
          requestedStyle: requested,
          resolvedStyle: resolved.id,
          fellBack,
          topic: trimmedTopic,
          length: text.length,
        },
      };
    },

    listAvailableStyles(): StyleSummary[] {
      return catalog.listStyles().map((s) => ({ id: s.id, description: s.description }));
    },
  };
}

const defaultBuilder = createPromptBuilder();

export const buildPrompt = (topic: string, style?: string | null): PromptResult =>
  defaultBuilder.buildPrompt(topic, style);

export const listAvailableStyles = (): StyleSummary[] => defaultBuilder.listAvailableStyles();
