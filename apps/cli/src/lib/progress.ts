/**
 * Spinner progress
 *
 * ProgressSink backed by one ora spinner per task.
 */

import ora, { type Ora } from 'ora';
import type { ProgressSink, ProgressUnit } from '@hiresdl/core';
import { formatBytes } from '@hiresdl/utils';

interface TaskProgress {
  spinner: Ora;
  description: string;
  total: number;
  done: number;
  unit: ProgressUnit;
}

export function formatProgress(description: string, done: number, total: number, unit: ProgressUnit): string {
  const percent = total > 0 ? Math.min(100, Math.floor((done / total) * 100)) : 0;
  const amount = unit === 'bytes'
    ? `${formatBytes(done)} / ${formatBytes(total)}`
    : `${done} / ${total}`;
  return `${description} ${amount} (${percent}%)`;
}

export class SpinnerProgress implements ProgressSink {
  private readonly tasks = new Map<string, TaskProgress>();

  constructor(private readonly enabled = process.stderr.isTTY === true) {}

  start(taskId: string, description: string, total: number, unit: ProgressUnit): void {
    const spinner = ora({
      text: formatProgress(description, 0, total, unit),
      isEnabled: this.enabled,
    }).start();
    this.tasks.set(taskId, { spinner, description, total, done: 0, unit });
  }

  advance(taskId: string, advanceBy: number): void {
    const task = this.tasks.get(taskId);
    if (!task) return;
    task.done += advanceBy;
    task.spinner.text = formatProgress(task.description, task.done, task.total, task.unit);
  }

  stop(taskId: string): void {
    const task = this.tasks.get(taskId);
    if (!task) return;
    task.spinner.succeed(task.description);
    this.tasks.delete(taskId);
  }
}
