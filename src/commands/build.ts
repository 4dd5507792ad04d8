import { Command } from 'commander';

import { CommandResult } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { addBuildOptions, openBuildSession, type CliBuildOptions } from '../cli/options.js';
import { logger } from '../utils/logger.js';

interface BuildCommandData {
  buildInfoPath?: string;
  buildInfo: Record<string, string>;
}

async function buildCommand(components: string[], options: CliBuildOptions): Promise<CommandResult<BuildCommandData>> {
  const { options: buildOptions, registry, definitions, definitionsPath } = await openBuildSession(options);

  const requirements = components.length > 0 ? { common: components } : definitions.requirements;
  logger.info(`Resolving prerequisites from ${definitionsPath}`, { requirements });

  await registry.initialize(definitions.definer, requirements, definitionsPath);

  const buildInfo = registry.getBuildInfo();
  if (buildOptions.dryRun) {
    console.log('✓ Prerequisites checked (dry run)');
    return { success: true, data: { buildInfo: buildInfo.toJSON() } };
  }

  const buildInfoPath = await buildInfo.save(registry.getSrcBuildDir());
  console.log('✓ Prerequisites ready');
  console.log(`Build variables written to ${buildInfoPath}`);
  return { success: true, data: { buildInfoPath, buildInfo: buildInfo.toJSON() } };
}

export function setupBuildCommand(program: Command): void {
  addBuildOptions(
    program
      .command('build')
      .argument('[components...]', 'components to require (default: the requirement set of the selected targets)')
      .description('Resolve, download and build prerequisite components')
  ).action(withErrorHandling(async (components: string[], options: CliBuildOptions) => {
    await buildCommand(components, options);
  }));
}
