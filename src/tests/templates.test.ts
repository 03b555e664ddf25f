import { describe, it } from 'node:test';
import assert from 'node:assert';

import { PROJECT_TYPES, getTemplate, isProjectType, listTemplates } from '../templates.js';

describe('Project templates', () => {
  it('loads every project type from the data file', () => {
    const templates = listTemplates();
    assert.deepStrictEqual(templates.map(t => t.type), [...PROJECT_TYPES]);
    for (const template of templates) {
      assert.strictEqual(template.features.length, 4);
    }
  });

  it('returns a single template by type', () => {
    assert.deepStrictEqual(getTemplate('landing'), {
      type: 'landing',
      name: 'Landing Page',
      description: 'Modern, responsive marketing landing page',
      features: ['Hero section', 'Services', 'Testimonials', 'Contact form'],
      estimatedTime: '3-5 days',
    });
  });

  it('recognises project types', () => {
    assert.strictEqual(isProjectType('api'), true);
    assert.strictEqual(isProjectType('blog'), false);
    assert.strictEqual(isProjectType(''), false);
  });
});
