export type LogScope = "registry" | "dispatcher" | "navigator" | "cli";

export class EngineLogger {
  constructor(
    public scope: LogScope,
    public enabled = false,
  ) {}

  public log(message: string, ...args: unknown[]) {
    if (this.enabled) {
      console.log(this.message(message), ...args);
    }
  }

  public warn(message: string, ...args: unknown[]) {
    if (this.enabled) {
      console.warn(this.message(message), ...args);
    }
  }

  public error(message: string, ...args: unknown[]) {
    if (this.enabled) {
      console.error(this.message(message), ...args);
    }
  }

  /** Same switch, different prefix. */
  public child(scope: LogScope): EngineLogger {
    return new EngineLogger(scope, this.enabled);
  }

  private message(message: string): string {
    return `[BDL ${this.scope}] ${message}`;
  }
}
