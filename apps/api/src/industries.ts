import { readFile } from 'node:fs/promises';

import { z } from 'zod';

const IndustryListSchema = z.array(z.string().trim().min(1)).min(1);

export const DEFAULT_INDUSTRIES_FILE = new URL('./data/industries.json', import.meta.url);

export async function loadIndustries(file: URL = DEFAULT_INDUSTRIES_FILE): Promise<string[]> {
  const raw = await readFile(file, 'utf8');
  return IndustryListSchema.parse(JSON.parse(raw));
}
