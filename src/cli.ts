#!/usr/bin/env node
/**
 * Command-line control of LED name badges.
 */

import { readFile } from 'node:fs/promises';
import yargs, { type Argv } from 'yargs';
import { hideBin } from 'yargs/helpers';
import { loadConfig } from './config';
import { BadgeDevice } from './device';
import { discoverBadges } from './discovery';
import { parseImageJson, renderPreview } from './encoding/bitmap';
import { formatHex, parseHex } from './encoding/hex';
import { concatSegments, renderText } from './encoding/text';
import { BadgeError, ConfigurationError } from './exceptions';
import { Animation } from './models/enums';
import {
  DEFAULT_DISPLAY_SETTINGS,
  SCROLL_MODE_CHOICES,
  parseScrollMode,
  type DisplaySettings,
} from './models/settings';
import { BlockCipher } from './protocol/cipher';
import { parseCommandBlock } from './protocol/commands';
import { BLOCK_SIZE, Characteristic } from './protocol/constants';
import { classifyToken, decodeNotification, parseToken, type BadgeResponse } from './protocol/responses';
import { MemoryTransport, badgeSimulator } from './transport/memory-transport';
import { NobleTransport } from './transport/noble-transport';

interface ConnectionArgs {
  address?: string;
  timeout?: number;
  dryRun: boolean;
}

interface DisplayArgs {
  mode: string;
  speed: number;
  brightness: number;
}

/**
 * Connect, run an operation, and disconnect.
 *
 * With `--dry-run` the badge is simulated in memory and every packet that
 * would have been written is printed instead.
 */
async function withBadge<T>(
  args: ConnectionArgs,
  operation: (badge: BadgeDevice) => Promise<T>
): Promise<T> {
  const config = loadConfig();
  const ackTimeoutMs = args.timeout ?? config.ackTimeoutMs;

  if (args.dryRun) {
    const cipher = new BlockCipher();
    const transport = new MemoryTransport({ responder: badgeSimulator(cipher) });
    try {
      return await operation(new BadgeDevice(transport, { cipher, ackTimeoutMs }));
    } finally {
      for (const write of transport.writes) {
        console.log(describeWrite(write.characteristic, write.data, cipher));
      }
      transport.close();
    }
  }

  const address = args.address ?? config.address;
  if (!address) {
    throw new ConfigurationError('No badge address: pass --address or set BADGE_ADDRESS');
  }

  const transport = await NobleTransport.connect(address, { scanTimeoutMs: config.scanTimeoutMs });
  try {
    return await operation(new BadgeDevice(transport, { ackTimeoutMs }));
  } finally {
    await transport.disconnect();
  }
}

function describeWrite(characteristic: Characteristic, data: Uint8Array, cipher: BlockCipher): string {
  if (characteristic === Characteristic.IMAGE_UPLOAD) {
    return `IMAGE_UPLOAD ${formatHex(data)}`;
  }
  const { name, args } = parseCommandBlock(cipher.decrypt(data));
  return `COMMAND      ${formatHex(data)}  ${name} ${formatHex(args)}`.trimEnd();
}

function describeResponse(response: BadgeResponse): string {
  switch (response.kind) {
    case 'ack':
      return `ack ${response.ack}`;
    case 'error':
      return `error ${JSON.stringify(response.code)}`;
    case 'deviceInfo':
      return `device ${response.info.rows}x${response.info.columns} variant ${JSON.stringify(response.info.variant)}`;
    case 'unexpected':
      return `unrecognized ${JSON.stringify(response.token)}`;
  }
}

function resolveMode(text: string): number {
  const mode = parseScrollMode(text);
  if (mode === undefined) {
    throw new ConfigurationError(
      `Unknown scroll mode ${JSON.stringify(text)} (use ${SCROLL_MODE_CHOICES.join(', ')} or 1-7)`
    );
  }
  return mode;
}

function displaySettings(args: DisplayArgs): DisplaySettings {
  return { mode: resolveMode(args.mode), speed: args.speed, brightness: args.brightness };
}

function withDisplayOptions<T>(argv: Argv<T>) {
  return argv
    .option('mode', {
      type: 'string',
      default: 'left',
      describe: `Scroll mode (${SCROLL_MODE_CHOICES.join(', ')} or 1-7)`,
    })
    .option('speed', { type: 'number', default: DEFAULT_DISPLAY_SETTINGS.speed, describe: 'Scroll speed 0-255' })
    .option('brightness', {
      type: 'number',
      default: DEFAULT_DISPLAY_SETTINGS.brightness,
      describe: 'Brightness 0-255',
    });
}

/**
 * Decode a packet from a trace: a command block, or a badge notification.
 */
function decodePacket(hex: string): string {
  const cipher = new BlockCipher();
  const bytes = parseHex(hex);

  if (bytes.length !== BLOCK_SIZE) {
    return `notification: ${describeResponse(decodeNotification(bytes, cipher))}`;
  }

  const block = cipher.decrypt(bytes);
  const lines = [`plaintext: ${formatHex(block)}`];

  // Replies such as DATCPOK also start with a command name
  const response = classifyToken(parseToken(block));
  if (response.kind !== 'unexpected') {
    lines.push(`notification: ${describeResponse(response)}`);
    return lines.join('\n');
  }

  try {
    const { name, args } = parseCommandBlock(block);
    lines.push(`command: ${name} ${formatHex(args)}`.trimEnd());
  } catch (error) {
    if (!(error instanceof BadgeError)) {
      throw error;
    }
    lines.push(`notification: ${describeResponse(response)}`);
  }
  return lines.join('\n');
}

export async function main(argv: string[] = hideBin(process.argv)): Promise<void> {
  await yargs(argv)
    .scriptName('led-badge')
    .usage('$0 <command> [options]')
    .option('address', {
      alias: 'a',
      type: 'string',
      describe: 'Badge MAC address or peripheral id (default: $BADGE_ADDRESS)',
    })
    .option('timeout', { type: 'number', describe: 'Acknowledgement timeout in ms' })
    .option('dry-run', {
      type: 'boolean',
      default: false,
      describe: 'Print the packets instead of sending them',
    })
    .command(
      'scan',
      'List nearby badges',
      (y) => y.option('all', { type: 'boolean', default: false, describe: 'Show every device' }),
      async (args) => {
        const badges = await discoverBadges({ timeoutMs: loadConfig().scanTimeoutMs, all: args.all });
        for (const badge of badges) {
          console.log(`${badge.address || badge.id}  ${badge.name ?? '(unnamed)'}  ${badge.rssi} dBm`);
        }
      }
    )
    .command('on', 'Turn the display on', {}, (args) => withBadge(args, (badge) => badge.powerOn()))
    .command('off', 'Turn the display off', {}, (args) => withBadge(args, (badge) => badge.powerOff()))
    .command(
      'brightness <level>',
      'Set brightness (0-255)',
      (y) => y.positional('level', { type: 'number', demandOption: true }),
      (args) => withBadge(args, (badge) => badge.setBrightness(args.level))
    )
    .command(
      'speed <level>',
      'Set scroll speed (0-255)',
      (y) => y.positional('level', { type: 'number', demandOption: true }),
      (args) => withBadge(args, (badge) => badge.setSpeed(args.level))
    )
    .command(
      'mode <mode>',
      'Set scroll mode',
      (y) => y.positional('mode', { type: 'string', demandOption: true }),
      (args) => withBadge(args, (badge) => badge.setMode(resolveMode(args.mode)))
    )
    .command(
      'text <text>',
      'Render text and show it',
      (y) => withDisplayOptions(y.positional('text', { type: 'string', demandOption: true })),
      async (args) => {
        const result = await withBadge(args, (badge) => badge.sendText(args.text, displaySettings(args)));
        console.log(`Sent ${result.totalLength} bytes in ${result.chunkCount} chunks (${result.elapsedMs}ms)`);
      }
    )
    .command(
      'image <file>',
      'Show a font-editor JSON image',
      (y) => withDisplayOptions(y.positional('file', { type: 'string', demandOption: true })),
      async (args) => {
        const payload = parseImageJson(await readFile(args.file, 'utf8'));
        const { mode, speed, brightness } = displaySettings(args);
        const result = await withBadge(args, (badge) =>
          badge.uploadAndDisplay(payload, mode, speed, brightness)
        );
        console.log(`Sent ${result.totalLength} bytes in ${result.chunkCount} chunks (${result.elapsedMs}ms)`);
      }
    )
    .command(
      'animation <id>',
      'Play a built-in animation (1-8)',
      (y) =>
        y.positional('id', {
          type: 'number',
          demandOption: true,
          choices: Object.values(Animation).filter((value) => typeof value === 'number'),
        }),
      (args) => withBadge(args, (badge) => badge.playAnimation(args.id))
    )
    .command('check', 'Query the badge (CHEC)', {}, async (args) => {
      const response = await withBadge(args, (badge) => badge.checkImages());
      console.log(describeResponse(response));
    })
    .command(
      'preview <text>',
      'Print how text will look on the display',
      (y) => y.positional('text', { type: 'string', demandOption: true }),
      (args) => {
        console.log(renderPreview(concatSegments(renderText(args.text))));
      }
    )
    .command(
      'decode <hex>',
      'Decrypt a packet copied from a BLE trace',
      (y) => y.positional('hex', { type: 'string', demandOption: true }),
      (args) => {
        console.log(decodePacket(args.hex));
      }
    )
    .demandCommand(1)
    .strict()
    .parseAsync();
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
