import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

export const PROJECT_TYPES = ['ecommerce', 'landing', 'dashboard', 'api'] as const;
export type ProjectType = typeof PROJECT_TYPES[number];

const templateSchema = z.object({
  name: z.string(),
  description: z.string(),
  features: z.array(z.string()),
  estimatedTime: z.string(),
});

const templatesSchema = z.object({
  ecommerce: templateSchema,
  landing: templateSchema,
  dashboard: templateSchema,
  api: templateSchema,
});

export type ProjectTemplate = z.infer<typeof templateSchema> & { type: ProjectType };

// Resolves to <package root>/data from both src/ and dist/
const TEMPLATES_PATH = fileURLToPath(new URL('../data/templates.json', import.meta.url));

let cache: z.infer<typeof templatesSchema> | null = null;

function loadTemplates(): z.infer<typeof templatesSchema> {
  if (!cache) {
    cache = templatesSchema.parse(JSON.parse(readFileSync(TEMPLATES_PATH, 'utf-8')));
  }
  return cache;
}

export function isProjectType(value: string): value is ProjectType {
  return PROJECT_TYPES.some(type => type === value);
}

export function getTemplate(type: ProjectType): ProjectTemplate {
  return { type, ...loadTemplates()[type] };
}

export function listTemplates(): ProjectTemplate[] {
  return PROJECT_TYPES.map(getTemplate);
}
