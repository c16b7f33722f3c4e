/**
 * Asks the text generator which third-party packages a program needs.
 *
 * Fail-open: any problem (collaborator error, no list in the response, a
 * malformed list) yields an empty list.
 */

import { Logger } from '@appforge/shared/Utils/logger.js';
import { toErrorMessage } from '@appforge/shared/Types/errors.js';
import { extractListLiteral } from '../utils/llm-output.js';
import { normalizeDependencies } from '../environment/manifest.js';
import type { TextGenerator } from '../llm/types.js';
import type { RuntimeProfile } from '../runtime/profiles.js';

const logger = new Logger('forge:deps');

export function buildInferencePrompt(source: string, profile: RuntimeProfile): string {
  return [
    `Analyze the following ${profile.displayName} code and list all external packages that need to be installed.`,
    `Only include direct dependencies that must be installed with ${profile.packageManager}, not modules from the standard library.`,
    `Format the response as a single bracketed list of quoted strings, each string being a ${profile.packageManager} package name, e.g. ["package-one", "package-two"].`,
    'Include version numbers only if they are critical for compatibility. Reply with [] when nothing needs installing.',
    '',
    'Code to analyze:',
    '```' + profile.fenceTag,
    source,
    '```',
  ].join('\n');
}

export class DependencyInferencer {
  constructor(private readonly generator: TextGenerator) {}

  async infer(source: string, profile: RuntimeProfile): Promise<string[]> {
    let response: string;
    try {
      response = await this.generator.generate(buildInferencePrompt(source, profile));
    } catch (err) {
      logger.warn(`Dependency inference call failed, continuing without dependencies: ${toErrorMessage(err)}`);
      return [];
    }

    const parsed = extractListLiteral(response);
    if (parsed === null) {
      logger.warn('No dependency list found in inference response', { response: response.slice(0, 200) });
      return [];
    }

    const dependencies = normalizeDependencies(parsed).filter((name) => !profile.isStandardModule(name));
    logger.debug(`Inferred ${dependencies.length} dependencies`, { dependencies });
    return dependencies;
  }
}
