import { z } from 'zod';
import { listTemplates, type ProjectTemplate } from '../templates.js';

export const listTemplatesSchema = z.object({});

export type ListTemplatesInput = z.infer<typeof listTemplatesSchema>;

export function listProjectTemplates(_input: ListTemplatesInput): { templates: ProjectTemplate[] } {
  return { templates: listTemplates() };
}
