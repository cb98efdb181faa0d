import { containsPhrase } from './text.match.js';

export type ResponseStyle = 'concise' | 'formal' | 'friendly';

export interface MessageSignals {
  urgent: boolean;
  style: ResponseStyle;
}

const URGENT_WORDS = ['urgent', 'asap', 'now', 'immediately', 'need a', 'emergency'];
const POLITE_WORDS = ['please', 'thank you', 'thanks'];

export function detectUrgencyAndStyle(text: string): MessageSignals {
  const lowered = text.toLowerCase();
  const urgent = URGENT_WORDS.some((w) => containsPhrase(lowered, w));
  const words = lowered.split(/\s+/).filter(Boolean);

  let style: ResponseStyle = 'friendly';
  if (words.length < 4) style = 'concise';
  else if (POLITE_WORDS.some((w) => containsPhrase(lowered, w))) style = 'formal';

  return { urgent, style };
}
