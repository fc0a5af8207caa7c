/**
 * Records keys into a named slot and replays them through a caller-supplied
 * dispatch function. Playback is synchronous; nesting (a macro that plays a
 * macro) is allowed up to `maxDepth` levels.
 */
export class MacroRecorder {
  private static readonly LOG_PREFIX = "[MacroRecorder]";

  private recording = false;
  private targetRegister = '';
  private accumulated: string[] = [];
  private readonly macros = new Map<string, string[]>();
  private depth = 0;

  constructor(private readonly maxDepth: number) {}

  get isRecording(): boolean {
    return this.recording;
  }

  get isPlaying(): boolean {
    return this.depth > 0;
  }

  get recordingRegister(): string | undefined {
    return this.recording ? this.targetRegister : undefined;
  }

  startRecording(register: string): void {
    this.recording = true;
    this.targetRegister = register;
    this.accumulated = [];
  }

  observe(key: string): void {
    if (this.recording && !this.isPlaying) {
      this.accumulated.push(key);
    }
  }

  stopRecording(): void {
    if (!this.recording) {
      return;
    }
    this.macros.set(this.targetRegister, this.accumulated);
    this.recording = false;
    this.targetRegister = '';
    this.accumulated = [];
  }

  getMacro(register: string): readonly string[] | undefined {
    return this.macros.get(register);
  }

  /** Returns false when nothing was played (unknown register or depth limit). */
  play(register: string, dispatch: (key: string) => void): boolean {
    const keys = this.macros.get(register);
    if (!keys) {
      return false;
    }
    if (this.depth >= this.maxDepth) {
      console.warn(
        `${MacroRecorder.LOG_PREFIX} Playback of @${register} stopped: nesting exceeds ${this.maxDepth}`
      );
      return false;
    }

    this.depth++;
    try {
      for (const key of [...keys]) {
        dispatch(key);
      }
    } finally {
      this.depth--;
    }
    return true;
  }
}
