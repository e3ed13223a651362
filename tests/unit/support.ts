import { Writable } from 'node:stream';
import { Logger } from '../../src/common/logger';
import { EntityConfig, Policy } from '../../src/policy/types';

export class MemoryWritable extends Writable {
  chunks: string[] = [];

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
    this.chunks.push(chunk.toString());
    callback();
  }

  text(): string {
    return this.chunks.join('');
  }
}

export const silentLogger = new Logger({ level: 'silent' });

export function policyFor(entities: Record<string, Partial<EntityConfig>>): Policy {
  return {
    name: 'test_policy',
    description: '',
    entities: Object.fromEntries(
      Object.entries(entities).map(([type, config]) => [
        type,
        { ...config, placeholder: config.placeholder ?? `[${type}_{i}]` },
      ]),
    ),
  };
}
