import type { StyleDefinition } from './catalog.js';

/**
 * The supported joke styles, in presentation order.
 * `classic` is the default and stays last.
 */
export const STYLE_DEFINITIONS: readonly StyleDefinition[] = [
  {
    id: 'pun',
    name: 'pun',
    description: 'Puns that play on multiple meanings of a word',
    technique:
      'Build the joke around a pun that plays on multiple meanings of a word connected to the topic. It should be groan-worthy but clever.',
    format: 'Land the pun in the final words of the joke.',
  },
  {
    id: 'wordplay',
    name: 'wordplay',
    description: 'Homophones, creative word combinations and unexpected word associations',
    technique:
      'Use creative word combinations, homophones, or unexpected word associations tied to the topic. Keep it punny.',
    format: 'Keep the joke to one or two sentences.',
  },
  {
    id: 'observational',
    name: 'observational',
    description: 'Points out something funny or absurd about everyday situations',
    technique:
      'Point out something funny or absurd about an everyday situation involving the topic. Make it relatable and wholesome.',
    format: 'Open with the everyday observation, then deliver the twist.',
  },
  {
    id: 'anti-humor',
    name: 'anti-humor',
    description: 'Subverts expectations with a literal or mundane punchline',
    technique:
      'Set up a joke about the topic, then subvert expectations with an unexpectedly literal or mundane punchline. The humor comes from the lack of a traditional punchline.',
    format: 'Use a familiar joke setup and a deadpan, literal answer.',
  },
  {
    id: 'question-answer',
    name: 'question-and-answer',
    description: "Classic 'Why did the X...?' or 'What do you call...?' format",
    technique:
      "Use the classic 'Why did the X...? Because...' or 'What do you call...?' format. Make it punny and groan-inducing.",
    format: 'The joke must pose a question on the first line and answer it on the second line.',
  },
  {
    id: 'one-liner',
    name: 'one-liner',
    description: 'A short, punchy joke delivered in a single sentence',
    technique:
      'Deliver the humor in a single short, punchy sentence. Focus on wordplay or an unexpected twist.',
    format: 'The joke must be exactly one sentence.',
  },
  {
    id: 'knock-knock',
    name: 'knock-knock',
    description: 'Knock-knock jokes built on clever wordplay',
    technique: 'Write a knock-knock joke that uses clever wordplay on the topic.',
    format:
      "The joke must follow the call-and-response shape, one line each: 'Knock knock.' / 'Who's there?' / '[X].' / '[X] who?' / '[Punchline].'",
  },
  {
    id: 'classic',
    name: 'classic dad',
    description: 'Classic dad joke with groan-worthy puns and wholesome humor',
    technique: 'Use classic dad joke style with groan-worthy puns and wholesome humor.',
    format: 'Keep the setup short and the punchline groan-worthy.',
  },
];
