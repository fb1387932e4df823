import { Command } from 'commander';

import { CommandResult } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { getPreset, listPresetNames } from '../core/presets.js';

export interface PresetSummary {
  name: string;
  targetFramework: string;
  referenceAssemblyPackage: string | null;
}

export function presetsCommand(): CommandResult<PresetSummary[]> {
  const summaries = listPresetNames().map(name => {
    const preset = getPreset(name);
    const pkg = preset.referenceAssemblyPackage;
    return {
      name,
      targetFramework: preset.targetFramework,
      referenceAssemblyPackage: pkg ? `${pkg.id}@${pkg.version.toString()}` : null
    };
  });

  return { success: true, data: summaries };
}

export function setupPresetsCommand(program: Command): void {
  program
    .command('presets')
    .description('List the built-in reference assembly presets')
    .action(withErrorHandling(async () => {
      const result = presetsCommand();
      const width = Math.max(0, ...(result.data ?? []).map(summary => summary.name.length));
      for (const summary of result.data ?? []) {
        console.log(`${summary.name.padEnd(width)}  ${summary.targetFramework}`);
      }
    }));
}
