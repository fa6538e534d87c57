/**
 * Scripted stand-in for the docker CLI.
 * Structurally compatible with stack-control's CommandRunner.
 */

export interface ScriptedResult {
  code: number;
  stdout?: string;
  stderr?: string;
}

export interface RecordedCommand {
  command: string;
  args: string[];
  cwd?: string;
}

/** Return undefined to fall back to a silent success */
export type CommandScript = (commandLine: string) => ScriptedResult | undefined;

export class FakeCommandRunner {
  readonly calls: RecordedCommand[] = [];

  constructor(private readonly script: CommandScript = () => undefined) {}

  async run(command: string, args: string[], options: { cwd?: string } = {}) {
    this.calls.push({ command, args, cwd: options.cwd });

    const result = this.script([command, ...args].join(' ')) ?? { code: 0 };
    return { code: result.code, stdout: result.stdout ?? '', stderr: result.stderr ?? '' };
  }

  commandLines(): string[] {
    return this.calls.map((call) => [call.command, ...call.args].join(' '));
  }
}
