import { Command } from 'commander';

import { CommandResult } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { addBuildOptions, openBuildSession, type CliBuildOptions } from '../cli/options.js';

interface ComponentAvailability {
  name: string;
  available: boolean;
  reason?: string;
}

async function checkCommand(components: string[], options: CliBuildOptions): Promise<CommandResult<ComponentAvailability[]>> {
  const { registry, definitions, definitionsPath } = await openBuildSession(options);
  await registry.initialize(definitions.definer, { common: [] }, definitionsPath);

  const results: ComponentAvailability[] = [];
  for (const name of components) {
    const result = await registry.checkComponent([name]);
    if (result.available) {
      console.log(`✓ ${name} available`);
      results.push({ name, available: true });
    } else {
      console.log(`❌ ${name} unavailable: ${result.reason}`);
      results.push({ name, available: false, reason: result.reason });
    }
  }

  const missing = results.filter(result => !result.available).length;
  if (missing > 0) {
    process.exitCode = 1;
  }
  console.log(`Summary: ${results.length - missing}/${results.length} available`);
  return { success: missing === 0, data: results };
}

export function setupCheckCommand(program: Command): void {
  addBuildOptions(
    program
      .command('check')
      .argument('<components...>', 'components to check')
      .description('Report whether optional components are available without failing the build')
  ).action(withErrorHandling(async (components: string[], options: CliBuildOptions) => {
    await checkCommand(components, options);
  }));
}
