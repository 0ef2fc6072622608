#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import readlineSync from 'readline-sync';
import {
  PrinterController,
  PrinterConfig,
  PrinterEvent,
  ErrorHandler,
  configFromEnv,
  loadConfigFile,
  mergeConfig,
} from './index';

type GlobalOptions = {
  config?: string;
  url?: string;
  apiKey?: string;
  timeout?: number;
  minSafeZ?: number;
};

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

const program = new Command();

program
  .name('toolhead-guard')
  .description('CLI to drive a Klipper printer through Moonraker with attachment-aware safety checks')
  .version('0.1.0')
  .option('-c, --config <path>', 'YAML config file (base_url, attach_min_x, ...)')
  .option('-u, --url <url>', 'Moonraker base URL (e.g., http://192.168.1.50:7125)')
  .option('-k, --api-key <key>', 'Moonraker API key')
  .option('-t, --timeout <ms>', 'HTTP timeout in milliseconds', parseNumber)
  .option('--min-safe-z <mm>', 'Minimum safe travel height', parseNumber);

function resolveConfig(): PrinterConfig {
  const options = program.opts<GlobalOptions>();
  const fromFile = options.config ? loadConfigFile(options.config) : {};
  return mergeConfig(fromFile, configFromEnv(), {
    baseUrl: options.url,
    apiKey: options.apiKey,
    timeoutMs: options.timeout,
    minSafeZ: options.minSafeZ,
  });
}

function askConfirmation(prompt: string): boolean {
  const answer = readlineSync.question(`${prompt}\nType 'CONFIRM' to continue: `);
  return answer.trim().toUpperCase() === 'CONFIRM';
}

async function withController(
  action: (controller: PrinterController) => Promise<void>,
  initialize: boolean = true
): Promise<void> {
  try {
    const config = resolveConfig();
    const controller = initialize
      ? await PrinterController.create(config, { confirm: askConfirmation })
      : new PrinterController(config, { confirm: askConfirmation });
    controller.on(PrinterEvent.Warning, message => console.log(chalk.yellow(`Warning: ${message}`)));
    await action(controller);
  } catch (err) {
    console.error(chalk.red(`Error: ${ErrorHandler.formatError(err)}`));
    process.exitCode = 1;
  }
}

const print = (label: string, value: unknown) =>
  console.log(chalk.blue(`${label}: ${JSON.stringify(value, null, 2)}`));

program
  .command('info')
  .description('Show printer info')
  .action(() => withController(async controller => {
    print('Info', await controller.printerInfo());
  }, false));

program
  .command('status')
  .description('Show toolhead, gcode_move, print_stats and webhooks status')
  .action(() => withController(async controller => {
    print('Status', await controller.queryStatus());
  }, false));

program
  .command('limits')
  .description('Show cached axis limits')
  .action(() => withController(async controller => {
    print('Limits', controller.getLimitsCached());
  }));

program
  .command('home')
  .description('Home axes (G28); asks for confirmation that attachments are removed')
  .argument('[axes]', 'Axes to home', 'XYZ')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .action((axes: string, options: { yes?: boolean }) => withController(async controller => {
    const result = await controller.home(axes, { confirm: !options.yes });
    console.log(chalk.green(`Homing complete: ${result.axes} in ${result.duration}ms`));
    if (result.parkedAt) {
      print('Parked at', result.parkedAt);
    }
  }));

program
  .command('move')
  .description('Absolute move with attachment bounds check')
  .requiredOption('--x <mm>', 'X target', parseNumber)
  .requiredOption('--y <mm>', 'Y target', parseNumber)
  .requiredOption('--z <mm>', 'Z target', parseNumber)
  .option('--speed <mm/s>', 'Speed', parseNumber, 20)
  .option('--contact', 'Target is a contact point (minimum safe height does not apply)')
  .option('--no-wait', 'Do not wait for the move to finish')
  .action((options: { x: number; y: number; z: number; speed: number; contact?: boolean; wait: boolean }) =>
    withController(async controller => {
      const target = await controller.moveAbsolute({
        x: options.x,
        y: options.y,
        z: options.z,
        speedMmS: options.speed,
        contact: options.contact,
        wait: options.wait,
      });
      print('Moved to', target);
    }));

program
  .command('move-rel')
  .description('Relative move; large Z steps are clamped')
  .option('--dx <mm>', 'X delta', parseNumber)
  .option('--dy <mm>', 'Y delta', parseNumber)
  .option('--dz <mm>', 'Z delta', parseNumber)
  .option('--speed <mm/s>', 'Speed', parseNumber, 20)
  .option('--no-wait', 'Do not wait for the move to finish')
  .action((options: { dx?: number; dy?: number; dz?: number; speed: number; wait: boolean }) =>
    withController(async controller => {
      const result = await controller.moveRelative({
        dx: options.dx,
        dy: options.dy,
        dz: options.dz,
        speedMmS: options.speed,
        wait: options.wait,
      });
      print('Moved to', result.target);
    }));

program
  .command('line')
  .description('Travel to the first point, then move in a straight line to the second')
  .requiredOption('--from <x,y,z>', 'Start point')
  .requiredOption('--to <x,y,z>', 'End point')
  .option('--speed <mm/s>', 'Line speed', parseNumber, 20)
  .option('--travel-speed <mm/s>', 'Speed to reach the start point', parseNumber)
  .action((options: { from: string; to: string; speed: number; travelSpeed?: number }) =>
    withController(async controller => {
      const point = (raw: string) => {
        const parts = raw.split(',').map(part => parseNumber(part));
        if (parts.length !== 3) throw new InvalidArgumentError(`Expected x,y,z (got '${raw}')`);
        return { x: parts[0], y: parts[1], z: parts[2] };
      };
      await controller.moveLine({
        from: point(options.from),
        to: point(options.to),
        speedMmS: options.speed,
        travelSpeedMmS: options.travelSpeed,
      });
      console.log(chalk.green('Line move complete'));
    }));

program
  .command('y-pass')
  .description('Lift, approach, lower to contact, travel along Y, lift')
  .requiredOption('--x <mm>', 'X position', parseNumber)
  .requiredOption('--y-start <mm>', 'Start Y', parseNumber)
  .requiredOption('--y-end <mm>', 'End Y', parseNumber)
  .requiredOption('--z-contact <mm>', 'Contact height', parseNumber)
  .option('--z-safe <mm>', 'Travel height (defaults to the minimum safe height)', parseNumber)
  .option('--travel-speed <mm/s>', 'Speed along Y', parseNumber, 25)
  .option('--approach-speed <mm/s>', 'Speed to the start point', parseNumber, 25)
  .action((options: {
    x: number; yStart: number; yEnd: number; zContact: number; zSafe?: number;
    travelSpeed: number; approachSpeed: number;
  }) => withController(async controller => {
    const result = await controller.safeYPass({
      x: options.x,
      yStart: options.yStart,
      yEnd: options.yEnd,
      zContact: options.zContact,
      zSafe: options.zSafe,
      travelSpeedMmS: options.travelSpeed,
      approachSpeedMmS: options.approachSpeed,
    });
    console.log(chalk.green(`Y pass complete (safe Z ${result.zSafe}, contact Z ${result.zContact})`));
  }));

program
  .command('motion-limits')
  .description('Set velocity and acceleration limits')
  .argument('<velocity>', 'Max velocity in mm/s', parseNumber)
  .argument('<accel>', 'Max acceleration in mm/s^2', parseNumber)
  .action((velocity: number, accel: number) => withController(async controller => {
    await controller.setMotionLimits(velocity, accel);
    console.log(chalk.green('Motion limits set'));
  }, false));

program
  .command('bed')
  .description('Read the bed temperature, or set it when a value is given')
  .argument('[temp]', 'Target temperature in C', parseNumber)
  .option('--wait', 'Wait until the target is reached (M190)')
  .action((temp: number | undefined, options: { wait?: boolean }) => withController(async controller => {
    if (temp !== undefined) {
      await controller.setBedTemperature(temp, { wait: options.wait });
      console.log(chalk.green(`Bed target set to ${temp}C`));
    }
    print('Bed', await controller.getBedTemperature());
  }, false));

program
  .command('chamber')
  .description('Read the chamber temperature, or set it when a value is given')
  .argument('[temp]', 'Target temperature in C', parseNumber)
  .option('--wait', 'Wait until the target is reached')
  .action((temp: number | undefined, options: { wait?: boolean }) => withController(async controller => {
    if (temp !== undefined) {
      const via = await controller.setChamberTemperature(temp, { wait: options.wait });
      console.log(chalk.green(`Chamber target set to ${temp}C via [${via}]`));
    }
    print('Chamber', await controller.getChamberTemperature());
  }, false));

program
  .command('gcode')
  .description('Send a raw G-code script (no safety checks)')
  .argument('<lines...>', 'G-code lines, one per argument (";" starts a comment)')
  .action((lines: string[]) => withController(async controller => {
    await controller.sendGcode(lines.join('\n'));
    console.log(chalk.green('Sent'));
  }, false));

if (process.argv.length <= 2) {
  program.help();
}

program.parseAsync().catch((err: unknown) => {
  console.error(chalk.red(`Error: ${ErrorHandler.formatError(err)}`));
  process.exitCode = 1;
});
