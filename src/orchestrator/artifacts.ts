import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import type { TaskKind } from '../core/types.js';
import { redactText } from '../audit/redact.js';

export const ARTIFACT_EXTENSIONS: Readonly<Record<TaskKind, string>> = {
  excel: 'xlsx',
  word: 'docx',
  ppt: 'pptx',
};

export function artifactFileName(taskId: string, kind: TaskKind): string {
  return `${taskId}.${ARTIFACT_EXTENSIONS[kind]}.txt`;
}

export interface ArtifactSink {
  /** Persist redacted text for a task. Returns where it went. */
  write(taskId: string, kind: TaskKind, safeText: string): string;
}

export class FileArtifactWriter implements ArtifactSink {
  constructor(public readonly dir: string) {}

  write(taskId: string, kind: TaskKind, safeText: string): string {
    mkdirSync(this.dir, { recursive: true });
    const path = join(this.dir, artifactFileName(taskId, kind));
    writeFileSync(path, redactText(safeText), 'utf-8');
    return path;
  }
}

export class MemoryArtifactSink implements ArtifactSink {
  readonly files = new Map<string, string>();

  write(taskId: string, kind: TaskKind, safeText: string): string {
    const path = `mem://${artifactFileName(taskId, kind)}`;
    this.files.set(path, redactText(safeText));
    return path;
  }
}
