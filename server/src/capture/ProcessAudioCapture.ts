import { ChildProcess, exec, spawn } from 'child_process';
import { promisify } from 'util';
import { PcmFrameReader } from './PcmFrameReader';
import { ConfigurationError } from '../sync/errors';
import type { AudioCaptureBackend, AudioDevice, AudioStream } from './types';

const execAsync = promisify(exec);

export interface CaptureCommand {
  name: string;
  binary: string;
  args(deviceSelector: string | undefined, sampleRate: number): string[];
  listDevices(): Promise<AudioDevice[]>;
}

/**
 * Parse `pactl list short sources`:
 * "<index>\t<name>\t<driver>\t<sample spec>\t<state>"
 */
export function parsePactlSources(output: string): AudioDevice[] {
  const devices: AudioDevice[] = [];
  for (const line of output.split('\n')) {
    const fields = line.trim().split('\t');
    if (fields.length < 2 || !fields[1]) continue;
    const channels = fields[3]?.match(/(\d+)ch/);
    devices.push({
      id: fields[1],
      name: fields[1],
      channels: channels ? parseInt(channels[1], 10) : undefined,
    });
  }
  return devices;
}

/**
 * Parse `arecord -L`: device names start a line, descriptions are indented.
 */
export function parseArecordDevices(output: string): AudioDevice[] {
  const devices: AudioDevice[] = [];
  for (const line of output.split('\n')) {
    if (!line.trim()) continue;
    if (/^\s/.test(line)) {
      const last = devices[devices.length - 1];
      if (last && last.name === last.id) {
        last.name = line.trim();
      }
      continue;
    }
    const id = line.trim();
    if (id === 'null') continue;
    devices.push({ id, name: id });
  }
  return devices;
}

export const PAREC_COMMAND: CaptureCommand = {
  name: 'PulseAudio',
  binary: 'parec',
  args: (deviceSelector, sampleRate) => [
    '--raw',
    '--format=float32le',
    '--channels=1',
    `--rate=${sampleRate}`,
    '--latency-msec=20',
    ...(deviceSelector ? [`--device=${deviceSelector}`] : []),
  ],
  listDevices: async () => {
    const { stdout } = await execAsync('pactl list short sources');
    return parsePactlSources(stdout);
  },
};

export const ARECORD_COMMAND: CaptureCommand = {
  name: 'ALSA',
  binary: 'arecord',
  args: (deviceSelector, sampleRate) => [
    '-q',
    '-t', 'raw',
    '-f', 'FLOAT_LE',
    '-c', '1',
    '-r', String(sampleRate),
    ...(deviceSelector ? ['-D', deviceSelector] : []),
  ],
  listDevices: async () => {
    const { stdout } = await execAsync('arecord -L');
    return parseArecordDevices(stdout);
  },
};

function waitForSpawn(child: ChildProcess): Promise<void> {
  return new Promise((resolve, reject) => {
    child.once('spawn', () => resolve());
    child.once('error', reject);
  });
}

/**
 * Audio capture through a recorder process writing raw PCM to stdout.
 */
export class ProcessAudioCapture implements AudioCaptureBackend {
  constructor(private readonly command: CaptureCommand) {}

  get name(): string {
    return this.command.name;
  }

  async open(deviceSelector: string | undefined, sampleRate: number): Promise<AudioStream> {
    const { binary } = this.command;
    const child = spawn(binary, this.command.args(deviceSelector, sampleRate), {
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    try {
      await waitForSpawn(child);
    } catch (error) {
      throw new ConfigurationError(
        `Could not start ${binary}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const stdout = child.stdout;
    if (!stdout) {
      child.kill();
      throw new ConfigurationError(`${binary} has no output stream`);
    }

    let lastStderr = '';
    child.stderr?.on('data', (chunk: Buffer) => {
      lastStderr = chunk.toString().trim() || lastStderr;
    });

    const reader = new PcmFrameReader(stdout, sampleRate, () => {
      if (child.exitCode === null) {
        child.kill();
      }
    });

    child.once('exit', (code) => {
      reader.markFailed(`${binary} exited with code ${code}${lastStderr ? `: ${lastStderr}` : ''}`);
    });

    return reader;
  }

  listDevices(): Promise<AudioDevice[]> {
    return this.command.listDevices();
  }
}

/**
 * Pick the first recorder available on PATH, or null when there is none.
 */
export async function resolveAudioBackend(
  commands: CaptureCommand[] = [PAREC_COMMAND, ARECORD_COMMAND]
): Promise<AudioCaptureBackend | null> {
  for (const command of commands) {
    try {
      await execAsync(`command -v ${command.binary}`);
      console.log(`[Capture] Audio backend: ${command.name} (${command.binary})`);
      return new ProcessAudioCapture(command);
    } catch {
      console.log(`[Capture] ${command.binary} not found`);
    }
  }
  console.warn('[Capture] No audio capture backend available');
  return null;
}
