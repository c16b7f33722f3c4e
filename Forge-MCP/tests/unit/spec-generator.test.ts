/**
 * Unit tests for the Specification Generator.
 */

import { describe, it, expect } from 'vitest';
import { SpecGenerator } from '../../src/generation/spec-generator.js';
import { ScriptedGenerator } from '../helpers.js';

const validSpec = {
  name: 'Recipe Helper',
  agents: [{ name: 'RecipeAgent', purpose: 'Suggest recipes', tools: ['search'] }],
  workflow: { steps: ['ask', 'suggest'], dependencies: [] },
  ui: { components: ['text_input'], layouts: ['single_column'] },
  integrations: [],
};

describe('SpecGenerator', () => {
  it('should parse a raw JSON response', async () => {
    const specs = new SpecGenerator(new ScriptedGenerator([JSON.stringify(validSpec)]));

    expect(await specs.analyze('an app that suggests recipes')).toEqual(validSpec);
  });

  it('should parse JSON wrapped in a fenced block and fill defaults', async () => {
    const reply = '```json\n{"agents": [{"name": "Solo"}]}\n```';
    const specs = new SpecGenerator(new ScriptedGenerator([reply]));

    expect(await specs.analyze('anything')).toEqual({
      agents: [{ name: 'Solo', purpose: '', tools: [] }],
      workflow: { steps: [], dependencies: [] },
      ui: { components: [], layouts: [] },
      integrations: [],
    });
  });

  it('should include the requirements in the prompt', async () => {
    const generator = new ScriptedGenerator([JSON.stringify(validSpec)]);
    await new SpecGenerator(generator).analyze('track my running times');

    expect(generator.prompts[0]).toContain('User prompt: track my running times');
  });

  it('should fall back to a default specification when the response is not JSON', async () => {
    const specs = new SpecGenerator(new ScriptedGenerator(['I would build a recipe app.']));

    const spec = await specs.analyze('recipes');

    expect(spec.error).toBe('Failed to generate valid specification');
    expect(spec.raw_response).toBe('I would build a recipe app....');
    expect(spec.agents).toEqual([{ name: 'DefaultAgent', purpose: 'Basic functionality', tools: ['basic_tools'] }]);
    expect(spec.workflow.steps).toEqual(['initialize', 'process', 'complete']);
    expect(spec.ui).toEqual({ components: ['basic_form'], layouts: ['single_column'] });
  });

  it('should fall back when the JSON has the wrong shape', async () => {
    const specs = new SpecGenerator(new ScriptedGenerator(['{"agents": "many"}']));

    const spec = await specs.analyze('recipes');

    expect(spec.error).toMatch(/^Failed to generate valid specification: agents: /);
    expect(spec.agents[0].name).toBe('DefaultAgent');
  });

  it('should return an empty specification when the generator fails', async () => {
    const specs = new SpecGenerator(new ScriptedGenerator([new Error('quota exceeded')]));

    expect(await specs.analyze('recipes')).toEqual({
      error: 'API Error: quota exceeded',
      agents: [],
      workflow: { steps: [], dependencies: [] },
      ui: { components: [], layouts: [] },
      integrations: [],
    });
  });
});
