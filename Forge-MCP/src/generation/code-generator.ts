/**
 * Code Generator — AppSpecification → Python sources for the agent, the
 * workflow and the Streamlit UI.
 */

import { Logger } from '@appforge/shared/Utils/logger.js';
import { toErrorMessage } from '@appforge/shared/Types/errors.js';
import { extractCodeBlock } from '../utils/llm-output.js';
import type { TextGenerator } from '../llm/types.js';
import type { AppSpecification } from './types.js';

const logger = new Logger('forge:codegen');

const AGENT_INSTRUCTIONS = `Generate a complete Python implementation for an LLM agent with the following specification. Include:
- All necessary imports
- Tool definitions
- Main agent class
- Processing logic
- A \`if __name__ == "__main__":\` block that exercises the agent once and prints the result

Return the program in a single \`\`\`python code block.`;

const WORKFLOW_INSTRUCTIONS = `Generate a complete Temporal workflow implementation in Python based on the following specification. Include:
- Activity definitions
- Workflow class
- Error handling
- Retry policies

Return the program in a single \`\`\`python code block.`;

const UI_INSTRUCTIONS = `Generate a complete Streamlit UI implementation in Python based on the following application specification. The UI should reflect the application's purpose and components.

Include:
- Necessary imports (especially \`streamlit as st\`)
- Appropriate Streamlit widgets based on the 'ui' section of the specification (components, layouts) and the purpose described by the agents
- Comments marking where agent calls would happen
- A single, runnable Python script for a Streamlit app

Return only the program, in a single \`\`\`python code block.`;

/** Code inside the first fenced block, or the whole response when there is none */
export function codeFromResponse(response: string): string {
  return (extractCodeBlock(response) ?? response).trim();
}

/** Streamlit script used when UI generation fails; shows the specification */
export function fallbackUi(spec: AppSpecification): string {
  // A JSON string literal is also a valid Python string literal
  const specLiteral = JSON.stringify(JSON.stringify(spec, null, 2));
  return [
    'import json',
    '',
    'import streamlit as st',
    '',
    `SPEC = json.loads(${specLiteral})`,
    '',
    'st.title("Generated App")',
    'st.write("UI generation failed. Using fallback UI.")',
    'st.write("Specification:")',
    'st.json(SPEC)',
    '',
  ].join('\n');
}

function specJson(spec: AppSpecification): string {
  return JSON.stringify(spec, null, 2);
}

export class CodeGenerator {
  constructor(private readonly generator: TextGenerator) {}

  async generateAgent(spec: AppSpecification): Promise<string> {
    const response = await this.generator.generate(`${AGENT_INSTRUCTIONS}\n\nSpecification: ${specJson(spec)}`);
    return codeFromResponse(response);
  }

  async generateWorkflow(spec: AppSpecification): Promise<string> {
    const response = await this.generator.generate(`${WORKFLOW_INSTRUCTIONS}\n\nSpecification: ${specJson(spec)}`);
    return codeFromResponse(response);
  }

  async generateUi(spec: AppSpecification, agentCode: string): Promise<string> {
    const prompt = [
      UI_INSTRUCTIONS,
      '',
      `Specification: ${specJson(spec)}`,
      '',
      'Reference the following agent code when generating the UI:',
      '```python',
      agentCode,
      '```',
    ].join('\n');

    try {
      const code = codeFromResponse(await this.generator.generate(prompt));
      if (code) return code;
      logger.warn('UI generation returned no code, using fallback UI');
    } catch (err) {
      logger.error(`UI generation failed, using fallback UI: ${toErrorMessage(err)}`);
    }
    return fallbackUi(spec);
  }
}
