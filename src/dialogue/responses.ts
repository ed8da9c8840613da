import { z } from 'zod';
import rawTemplates from './templates.json';
import { classify, type Classification, type Intent } from './intents';
import { randomPicker, type VariantPicker } from './picker';

const variants = z.array(z.string().min(1)).min(1);
const questionTemplate = z.object({ topic: z.string().min(1), bare: z.string().min(1) });

const TemplatesSchema = z.object({
  empty_input: z.string().min(1),
  greeting: variants,
  identity: variants,
  time: variants,
  date: variants,
  wellbeing: variants,
  weather: variants,
  joke: variants,
  help: variants,
  thanks: variants,
  farewell: variants,
  life_meaning: variants,
  compliment: variants,
  question_what: questionTemplate,
  question_how: questionTemplate,
  question_why: questionTemplate,
  question_when: questionTemplate,
  question_where: questionTemplate,
  question_who: questionTemplate,
  generic_question: variants,
  fallback: variants,
});

export type ResponseTemplates = z.infer<typeof TemplatesSchema>;

export const TEMPLATES: ResponseTemplates = TemplatesSchema.parse(rawTemplates);

export const EMPTY_INPUT_REPLY = TEMPLATES.empty_input;

export interface GenerateOptions {
  picker?: VariantPicker;
  now?: () => Date;
  agentName?: string;
}

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];
const MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

export function formatClockTime(date: Date): string {
  const hours = date.getHours();
  const minutes = date.getMinutes().toString().padStart(2, '0');
  const suffix = hours < 12 ? 'AM' : 'PM';
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  return `${hour12}:${minutes} ${suffix}`;
}

export function formatCalendarDate(date: Date): string {
  return `${WEEKDAYS[date.getDay()]}, ${MONTHS[date.getMonth()]} ${date.getDate()}, ${date.getFullYear()}`;
}

function fill(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, key: string) => values[key] ?? placeholder);
}

function isQuestionIntent(
  intent: Intent,
): intent is 'question_what' | 'question_how' | 'question_why' | 'question_when' | 'question_where' | 'question_who' {
  return intent.startsWith('question_');
}

function selectTemplate(classification: Classification, picker: VariantPicker): string {
  const { intent } = classification;
  if (isQuestionIntent(intent)) {
    const template = TEMPLATES[intent];
    return classification.topic ? template.topic : template.bare;
  }
  return picker(TEMPLATES[intent]);
}

/**
 * Builds the rule-based reply for an utterance. Accepts a precomputed
 * classification or a bare intent; the utterance supplies slot values.
 */
export function generateResponse(
  input: Classification | Intent,
  utterance: string,
  options: GenerateOptions = {},
): string {
  if (utterance.trim() === '') {
    return EMPTY_INPUT_REPLY;
  }

  const picker = options.picker ?? randomPicker;
  const now = options.now ?? (() => new Date());
  const slots = classify(utterance);
  const classification: Classification = typeof input === 'string' ? { ...slots, intent: input } : input;

  const template = selectTemplate(classification, picker);
  const current = now();
  return fill(template, {
    agent: options.agentName ?? 'Nova',
    time: formatClockTime(current),
    date: formatCalendarDate(current),
    topic: classification.topic ?? '',
    word: classification.firstWord,
  });
}

export function replyFor(utterance: string, options: GenerateOptions = {}): { intent: Intent | null; text: string } {
  if (utterance.trim() === '') {
    return { intent: null, text: EMPTY_INPUT_REPLY };
  }
  const classification = classify(utterance);
  return { intent: classification.intent, text: generateResponse(classification, utterance, options) };
}
