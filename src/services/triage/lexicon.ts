// Word lists for entity extraction, loaded from data/lexicon.json

import { readFileSync } from 'fs';
import { z } from 'zod';

const LEXICON_URL = new URL('../../../data/lexicon.json', import.meta.url);

const LexiconSchema = z.object({
  nameStopWords: z.array(z.string()),
});

const lexicon = LexiconSchema.parse(JSON.parse(readFileSync(LEXICON_URL, 'utf8')));

export const NAME_STOP_WORDS: ReadonlySet<string> = new Set(lexicon.nameStopWords.map(w => w.toLowerCase()));
