export interface CallScript {
  inboundGreeting: string;
  outboundGreeting: string;
  noInput: string;
  reprompt: string;
  farewell: string;
  outboundNoResponse: string;
  apology: string;
}

export function buildCallScript(agentName: string): CallScript {
  return {
    inboundGreeting: `Hello! Welcome to ${agentName}. How can I help you today?`,
    outboundGreeting: `Hello! This is ${agentName} calling. How can I assist you today?`,
    noInput: "I didn't hear anything. Please try again.",
    reprompt: 'Is there anything else I can help with?',
    farewell: `Thank you for calling ${agentName}. Goodbye!`,
    outboundNoResponse: "I didn't hear a response. Goodbye!",
    apology: 'Sorry, something went wrong. Please call again later.',
  };
}

const TERMINATION_WORDS = ['bye', 'goodbye', 'quit', 'exit'];
const TERMINATION_PHRASES = ['hang up'];

/** True when the caller asked to end the call. Matches whole words only ("quite" is not "quit"). */
export function isTerminationRequest(transcript: string): boolean {
  const text = transcript.trim().toLowerCase();
  const words: string[] = text.match(/[a-z']+/g) ?? [];
  if (TERMINATION_WORDS.some((word) => words.includes(word))) {
    return true;
  }
  const spaced = ` ${words.join(' ')} `;
  return TERMINATION_PHRASES.some((phrase) => spaced.includes(` ${phrase} `));
}
