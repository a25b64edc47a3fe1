import { Command } from 'commander';
import chalk from 'chalk';

import { listPurposePresets, STYLE_HINTS, STYLE_PRESETS } from '../../domain/image-chat/presets.js';

export const presetsCommand = new Command('presets')
  .description('List image purposes and style presets')
  .action(() => {
    console.log(chalk.cyan('\nPurposes:'));
    for (const preset of listPurposePresets()) {
      const size = preset.width && preset.height ? `${preset.width}x${preset.height}` : 'any size';
      console.log(`  ${chalk.white(preset.id.padEnd(24))} ${chalk.gray(`${preset.ratio.padEnd(6)} ${size.padEnd(10)}`)} ${preset.description}`);
    }

    console.log(chalk.cyan('\nStyles:'));
    for (const style of STYLE_PRESETS) {
      console.log(`  ${chalk.white(style.padEnd(24))} ${chalk.gray(STYLE_HINTS[style])}`);
    }
    console.log();
  });
