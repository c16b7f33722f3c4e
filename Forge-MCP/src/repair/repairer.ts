/**
 * Turns a failed run into one regenerated program.
 *
 * The failure report carries the captured stderr, the original source and the
 * dependency list. Only the first fenced code block of the response is kept.
 * The corrected code is not validated here; the re-run decides.
 */

import { Logger } from '@appforge/shared/Utils/logger.js';
import { toErrorMessage } from '@appforge/shared/Types/errors.js';
import { extractCodeBlock } from '../utils/llm-output.js';
import { RepairGenerationError } from '../errors.js';
import type { TextGenerator } from '../llm/types.js';
import type { RuntimeProfile } from '../runtime/profiles.js';

const logger = new Logger('forge:repair');

export interface RepairRequest {
  source: string;
  stderr: string;
  dependencies: readonly string[];
  profile: RuntimeProfile;
}

export function buildRepairPrompt(request: RepairRequest): string {
  const deps = request.dependencies.length > 0 ? request.dependencies.join(', ') : '(none)';
  return [
    `${request.profile.displayName} code execution failed with error:`,
    request.stderr.trim() || '(no error output)',
    '',
    'Original code:',
    '```' + request.profile.fenceTag,
    request.source,
    '```',
    '',
    `Please fix the code and ensure it works with the following dependencies: ${deps}`,
    `Return the complete corrected program in a single \`\`\`${request.profile.fenceTag} code block.`,
  ].join('\n');
}

export class FailureRepairer {
  constructor(private readonly generator: TextGenerator) {}

  async repair(request: RepairRequest): Promise<string> {
    let response: string;
    try {
      response = await this.generator.generate(buildRepairPrompt(request));
    } catch (err) {
      throw new RepairGenerationError(`Repair generation failed: ${toErrorMessage(err)}`);
    }

    const code = extractCodeBlock(response);
    if (code === null) {
      throw new RepairGenerationError('Repair response contained no code block', {
        response: response.slice(0, 200),
      });
    }
    if (code.trim() === '') {
      throw new RepairGenerationError('Repair response contained an empty code block');
    }

    logger.debug(`Repair produced ${code.split('\n').length} lines`);
    return code;
  }
}
