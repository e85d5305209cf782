import { CONFIG_KEYS, type ConfigMap } from '../types/models';

export const DEFAULT_REJECT_MARKER = 'not worthwhile';

// Seeded into the settings table when a key is absent; existing values are never overwritten
export const DEFAULT_PROVIDER_SETTINGS: ConfigMap = {
  [CONFIG_KEYS.provider]: 'openai',
  [CONFIG_KEYS.apiUrl]: 'https://api.openai.com/v1',
  [CONFIG_KEYS.model]: 'gpt-4o-mini',
  [CONFIG_KEYS.filterRejectMarker]: DEFAULT_REJECT_MARKER,
  [CONFIG_KEYS.promptFilter]: [
    'You are a news screening assistant. Decide whether the following article is worth reading.',
    'Reply with JSON only: {"worth": true/false, "reason": "short explanation"}',
    'Only significant technology news and industry developments are worth reading; adverts, job postings and filler are not worthwhile.'
  ].join('\n'),
  [CONFIG_KEYS.promptSummary]: [
    'Summarize the core content of the following article:',
    '1. Keep it under 200 words',
    '2. Lead with the key facts',
    '3. Use plain, concise language'
  ].join('\n'),
};
