#!/usr/bin/env node

/**
 * CLI tool for replaying time state timelines
 * 回放时间状态时间线的CLI工具
 *
 * Reads a timeline script, replays it against a fresh time state machine and
 * prints every notification. The resulting history can be dumped as JSON or
 * MessagePack for later inspection.
 * 读取时间线脚本，在新的时间状态机上回放并打印所有通知。
 * 结果历史可以导出为JSON或MessagePack。
 */

import * as fs from 'fs';
import * as path from 'path';
import { program } from 'commander';
import chalk from 'chalk';
import { TimelineRunner, parseTimelineScript } from './TimelineRunner';
import type { TimelineEntry, TimelineResult } from './TimelineRunner';
import { HistorySerializer } from '../src/serialize/HistorySerializer';
import { SerializationFormat } from '../src/utils/SerializationTypes';

interface CLIOptions {
  dt?: string;
  duration?: string;
  dump?: string;
  format: string;
  quiet?: boolean;
}

const EVENT_COLORS: Record<string, (text: string) => string> = {
  stateChanged: chalk.cyan,
  enteredTacticalMode: chalk.yellow,
  exitedTacticalMode: chalk.green,
  autoExitTriggered: chalk.magenta,
  rejected: chalk.red
};

function printEntry(entry: TimelineEntry): void {
  const color = EVENT_COLORS[entry.event] ?? chalk.gray;
  const time = entry.time.toFixed(3).padStart(8);
  console.log(`${chalk.gray(time + 's')}  ${color(entry.event.padEnd(20))} ${entry.detail}`);
}

function printSummary(result: TimelineResult): void {
  const admitted = result.outcomes.filter(Boolean).length;
  console.log('');
  console.log(chalk.blue('📊 Timeline Summary:'));
  console.log(chalk.green(`   ✅ Admitted: ${admitted}`));
  if (admitted < result.outcomes.length) {
    console.log(chalk.red(`   ❌ Rejected: ${result.outcomes.length - admitted}`));
  }
  console.log(chalk.gray(`   Final: ${result.finalState} @ ${result.finalScale.toFixed(3)}`));
  console.log(chalk.gray(`   Simulation steps: ${result.simulationSteps}`));
}

function parseFormat(value: string): SerializationFormat {
  const format = Object.values(SerializationFormat).find(f => f === value);
  if (format === undefined) {
    throw new Error(`Unknown dump format '${value}', expected json or binary`);
  }
  return format;
}

/**
 * Main program entry point
 * 主程序入口点
 */
async function main(): Promise<void> {
  program
    .name('simulate-timeline')
    .description('Replay a time state timeline script')
    .version('0.1.0');

  program
    .argument('<script>', 'Timeline script (JSON)')
    .option('--dt <seconds>', 'Real seconds per frame (overrides the script)')
    .option('--duration <seconds>', 'Real seconds to simulate (overrides the script)')
    .option('--dump <file>', 'Write the resulting history to a file')
    .option('--format <format>', 'Dump format (json/binary)', 'json')
    .option('-q, --quiet', 'Only print the summary')
    .action(async (scriptPath: string, options: CLIOptions) => {
      try {
        const raw: unknown = JSON.parse(await fs.promises.readFile(scriptPath, 'utf8'));
        const script = parseTimelineScript(raw);
        if (options.dt !== undefined) script.frameDt = Number(options.dt);
        if (options.duration !== undefined) script.duration = Number(options.duration);
        if (!(script.frameDt > 0) || !(script.duration >= 0)) {
          throw new Error('--dt must be positive and --duration non-negative');
        }

        console.log(chalk.blue(`📖 Replaying: ${path.relative(process.cwd(), scriptPath)}`));
        const result = new TimelineRunner().run(script);

        if (!options.quiet) {
          result.entries.forEach(printEntry);
        }
        printSummary(result);

        if (options.dump) {
          const format = parseFormat(options.format);
          const dump = await new HistorySerializer().serialize(result.history, { format, prettyPrint: true });
          await fs.promises.writeFile(options.dump, dump.data);
          console.log(chalk.green(`💾 History written: ${options.dump} (${dump.size} bytes)`));
        }
      } catch (error) {
        console.error(chalk.red('❌ Fatal error:'), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });

  // Add help examples 添加帮助示例
  program.addHelpText('after', `
Examples:
  simulate-timeline examples/timelines/tactical-sequence.json
  simulate-timeline script.json --dt 0.1 --duration 20
  simulate-timeline script.json --dump history.bin --format binary
`);

  await program.parseAsync();
}

// Run the CLI tool 运行CLI工具
if (require.main === module) {
  main().catch(error => {
    console.error(chalk.red('❌ Unhandled error:'), error);
    process.exit(1);
  });
}
