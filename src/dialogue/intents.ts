export type Intent =
  | 'greeting'
  | 'identity'
  | 'time'
  | 'date'
  | 'wellbeing'
  | 'weather'
  | 'joke'
  | 'help'
  | 'thanks'
  | 'farewell'
  | 'life_meaning'
  | 'compliment'
  | 'question_what'
  | 'question_how'
  | 'question_why'
  | 'question_when'
  | 'question_where'
  | 'question_who'
  | 'generic_question'
  | 'fallback';

export interface Classification {
  intent: Intent;
  /** Keyword or phrase that selected the intent, when one did. */
  keyword: string | null;
  /** First whitespace-delimited token of the lowercased utterance. */
  firstWord: string;
  /** Text after the leading question word, for question intents. */
  topic: string | null;
}

interface NormalizedUtterance {
  text: string;
  words: string[];
  firstWord: string;
}

type MatchResult = { keyword: string | null; topic?: string | null } | null;

interface IntentRule {
  intent: Intent;
  match: (utterance: NormalizedUtterance) => MatchResult;
}

const QUESTION_WORDS = [
  ['what', 'question_what'],
  ['how', 'question_how'],
  ['why', 'question_why'],
  ['when', 'question_when'],
  ['where', 'question_where'],
  ['who', 'question_who'],
] as const;

export const COMPLIMENT_WORDS = [
  'great',
  'awesome',
  'amazing',
  'smart',
  'cool',
  'brilliant',
  'wonderful',
  'fantastic',
  'nice',
  'excellent',
  'clever',
  'helpful',
] as const;

function normalize(utterance: string): NormalizedUtterance {
  const text = utterance.trim().toLowerCase();
  const words = text.match(/[a-z0-9']+/g) ?? [];
  const firstWord = text.split(/\s+/)[0] ?? '';
  return { text, words, firstWord };
}

function anyWord(candidates: readonly string[]): (u: NormalizedUtterance) => MatchResult {
  return (u) => {
    const found = candidates.find((candidate) => u.words.includes(candidate));
    return found ? { keyword: found } : null;
  };
}

function anyPhrase(candidates: readonly string[]): (u: NormalizedUtterance) => MatchResult {
  return (u) => {
    const found = candidates.find((candidate) => u.text.includes(candidate));
    return found ? { keyword: found } : null;
  };
}

function firstOf(
  ...matchers: Array<(u: NormalizedUtterance) => MatchResult>
): (u: NormalizedUtterance) => MatchResult {
  return (u) => {
    for (const matcher of matchers) {
      const result = matcher(u);
      if (result) {
        return result;
      }
    }
    return null;
  };
}

function questionWord(word: string): (u: NormalizedUtterance) => MatchResult {
  return (u) => {
    const [lead, ...rest] = u.words;
    if (lead !== word && !(lead?.startsWith(`${word}'`) ?? false)) {
      return null;
    }
    const topic = rest.join(' ').trim();
    return { keyword: word, topic: topic === '' ? null : topic };
  };
}

// Order is significant: earlier rules pre-empt later ones for overlapping input
// ("what is the weather" is weather, "how are you" is wellbeing).
export const INTENT_RULES: readonly IntentRule[] = [
  { intent: 'greeting', match: anyWord(['hello', 'hi', 'hey', 'greetings', 'sup']) },
  { intent: 'identity', match: anyPhrase(['who are you', 'your name', 'what are you']) },
  {
    intent: 'time',
    match: (u) => (u.text.includes('time') && !u.text.includes('sometimes') ? { keyword: 'time' } : null),
  },
  { intent: 'date', match: anyPhrase(['date', 'today', 'what day']) },
  { intent: 'wellbeing', match: anyPhrase(['how are you', 'how do you feel']) },
  { intent: 'weather', match: anyPhrase(['weather', 'temperature']) },
  { intent: 'joke', match: anyPhrase(['joke', 'funny', 'make me laugh']) },
  { intent: 'help', match: anyPhrase(['help', 'what can you do', 'capabilities']) },
  { intent: 'thanks', match: firstOf(anyPhrase(['thank', 'appreciate']), anyWord(['thx', 'ty'])) },
  {
    intent: 'farewell',
    match: firstOf(anyWord(['bye', 'goodbye', 'quit', 'exit', 'farewell']), anyPhrase(['see you'])),
  },
  {
    intent: 'life_meaning',
    match: (u) => {
      if (u.text.includes('meaning of life')) {
        return { keyword: 'meaning of life' };
      }
      return u.text.includes('life') && u.text.includes('meaning') ? { keyword: 'meaning' } : null;
    },
  },
  { intent: 'compliment', match: anyWord(COMPLIMENT_WORDS) },
  ...QUESTION_WORDS.map(([word, intent]): IntentRule => ({ intent, match: questionWord(word) })),
  { intent: 'generic_question', match: (u) => (u.text.endsWith('?') ? { keyword: '?' } : null) },
];

export function classify(utterance: string): Classification {
  const normalized = normalize(utterance);

  for (const rule of INTENT_RULES) {
    const result = rule.match(normalized);
    if (result) {
      return {
        intent: rule.intent,
        keyword: result.keyword,
        firstWord: normalized.firstWord,
        topic: result.topic ?? null,
      };
    }
  }

  return { intent: 'fallback', keyword: null, firstWord: normalized.firstWord, topic: null };
}

export function classifyIntent(utterance: string): Intent {
  return classify(utterance).intent;
}
