import { describe, expect, it } from 'vitest';
import { buildPrompt, composePromptText, createPromptBuilder, listAvailableStyles } from './builder.js';
import { STYLE_IDS, createStyleCatalog, resolveStyle } from '../styles/catalog.js';
import { InvalidArgumentError } from '../../utils/errors.js';

describe('buildPrompt', () => {
  it('composes the classic prompt by default', () => {
    const result = buildPrompt('coffee');

    expect(result.text).toBe(
      [
        'You are an expert comedian who specializes in classic dad jokes.',
        '',
        'TECHNIQUE: Use classic dad joke style with groan-worthy puns and wholesome humor.',
        '',
        'TOPIC: coffee',
        '',
        'Rules:',
        '- Write exactly one dad joke about the topic above.',
        '- Keep it appropriate for a workplace: wholesome, family-friendly, no profanity, no insults.',
        '- Keep the setup short and the punchline groan-worthy.',
        '',
        'Respond with ONLY the joke text, nothing else.',
      ].join('\n'),
    );
    expect(result.metadata).toEqual({
      requestedStyle: null,
      resolvedStyle: 'classic',
      fellBack: false,
      topic: 'coffee',
      length: result.text.length,
    });
  });

  it('builds a pun prompt about fish', () => {
    const result = buildPrompt('fish', 'pun');

    expect(result.text).toContain('fish');
    expect(result.text).toContain(resolveStyle('pun').technique);
    expect(result.metadata.resolvedStyle).toBe('pun');
    expect(result.metadata.fellBack).toBe(false);
  });

  it('is deterministic for every style', () => {
    for (const style of STYLE_IDS) {
      expect(buildPrompt('office printers', style).text).toBe(buildPrompt('office printers', style).text);
    }
  });

  it('trims the topic and inserts it verbatim', () => {
    const result = buildPrompt('  <b>tax season</b>  ', 'classic');
    expect(result.metadata.topic).toBe('<b>tax season</b>');
    expect(result.text).toContain('TOPIC: <b>tax season</b>\n');
  });

  it('requires the knock-knock call-and-response shape', () => {
    const result = buildPrompt('knock-knock joke topic', 'knock-knock');
    expect(result.text).toContain(
      "- The joke must follow the call-and-response shape, one line each: 'Knock knock.' / 'Who's there?' / '[X].' / '[X] who?' / '[Punchline].'",
    );
  });

  it('requires the question-answer style to pose and answer a question', () => {
    const result = buildPrompt('gardening', 'question-answer');
    expect(result.text).toContain('specializes in question-and-answer jokes.');
    expect(result.text).toContain(
      '- The joke must pose a question on the first line and answer it on the second line.',
    );
  });

  it('matches styles case-insensitively', () => {
    const upper = buildPrompt('cats', 'PUN');
    const lower = buildPrompt('cats', 'pun');
    expect(upper.text).toBe(lower.text);
    expect(upper.metadata.resolvedStyle).toBe('pun');
    expect(upper.metadata.requestedStyle).toBe('PUN');
    expect(upper.metadata.fellBack).toBe(false);
  });

  it('falls back to classic for unknown styles and reports it', () => {
    const result = buildPrompt('dogs', 'limerick');
    expect(result.text).toBe(buildPrompt('dogs').text);
    expect(result.metadata).toMatchObject({
      requestedStyle: 'limerick',
      resolvedStyle: 'classic',
      fellBack: true,
    });
  });

  it('does not report a fallback for a blank style', () => {
    const result = buildPrompt('dogs', '  ');
    expect(result.metadata.resolvedStyle).toBe('classic');
    expect(result.metadata.fellBack).toBe(false);
  });

  it.each(['', '   ', '\n\t'])('rejects the empty topic %j', (topic) => {
    expect(() => buildPrompt(topic, 'pun')).toThrow(InvalidArgumentError);
    expect(() => buildPrompt(topic, 'limerick')).toThrow('Missing required argument: topic');
  });

  it('reports the missing field on the error', () => {
    try {
      buildPrompt('');
      expect.unreachable('buildPrompt should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidArgumentError);
      if (err instanceof InvalidArgumentError) {
        expect(err.field).toBe('topic');
        expect(err.code).toBe('INVALID_ARGUMENT');
      }
    }
  });
});

describe('composePromptText', () => {
  it('names the style in the persona preamble', () => {
    expect(composePromptText('bread', resolveStyle('one-liner'))).toMatch(
      /^You are an expert comedian who specializes in one-liner jokes\.\n/,
    );
  });
});

describe('listAvailableStyles', () => {
  it('projects the catalog to id and description', () => {
    const styles = listAvailableStyles();
    expect(styles).toHaveLength(8);
    expect(styles[0]).toEqual({ id: 'pun', description: 'Puns that play on multiple meanings of a word' });
    expect(styles.map((s) => s.id)).toEqual([...STYLE_IDS]);
  });
});

describe('createPromptBuilder', () => {
  it('uses the injected catalog', () => {
    const catalog = createStyleCatalog(
      [
        {
          id: 'one-liner',
          name: 'one-liner',
          description: 'Short',
          technique: 'Be brief.',
          format: 'One sentence.',
        },
      ],
      'one-liner',
    );
    const builder = createPromptBuilder(catalog);

    expect(builder.listAvailableStyles()).toEqual([{ id: 'one-liner', description: 'Short' }]);
    const result = builder.buildPrompt('socks', 'pun');
    expect(result.metadata.resolvedStyle).toBe('one-liner');
    expect(result.metadata.fellBack).toBe(true);
    expect(result.text).toContain('TECHNIQUE: Be brief.');
  });
});
