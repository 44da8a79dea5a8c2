import { TOOL_NAME, TOOL_VERSION } from '../config/constants';
import type { CommandName } from '../cli/types';

export interface JsonEnvelope<T> {
  command: CommandName;
  file: string;
  result: T;
  metadata: {
    tool: string;
    version: string;
    timestamp: string;
  };
}

export class JsonFormatter<T> {
  constructor(
    private readonly command: CommandName,
    private readonly file: string
  ) {}

  build(result: T, now: Date = new Date()): JsonEnvelope<T> {
    return {
      command: this.command,
      file: this.file,
      result,
      metadata: {
        tool: TOOL_NAME,
        version: TOOL_VERSION,
        timestamp: now.toISOString(),
      },
    };
  }

  toJson(result: T, now?: Date): string {
    return JSON.stringify(this.build(result, now), null, 2);
  }
}
