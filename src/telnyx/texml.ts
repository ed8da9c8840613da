import type { CallInstruction } from '../calls/instructions';

export interface TexmlOptions {
  voice: string;
  language: string;
}

export const TEXML_CONTENT_TYPE = 'application/xml';

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function renderInstruction(instruction: CallInstruction, options: TexmlOptions): string {
  switch (instruction.kind) {
    case 'say':
      return `<Say voice="${escapeXml(options.voice)}" language="${escapeXml(options.language)}">${escapeXml(
        instruction.text,
      )}</Say>`;
    case 'gather':
      return `<Gather input="speech" action="${escapeXml(instruction.actionUrl)}" method="POST" speechTimeout="auto" language="${escapeXml(
        options.language,
      )}"/>`;
    case 'redirect':
      return `<Redirect method="POST">${escapeXml(instruction.url)}</Redirect>`;
    case 'hangup':
      return '<Hangup/>';
  }
}

/** Renders call instructions as a TeXML (TwiML-compatible) document. */
export function renderTexml(instructions: CallInstruction[], options: TexmlOptions): string {
  const body = instructions.map((instruction) => renderInstruction(instruction, options)).join('');
  return `<?xml version="1.0" encoding="UTF-8"?><Response>${body}</Response>`;
}
