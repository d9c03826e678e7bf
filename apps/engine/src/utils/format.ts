import { TaskEntity } from '../db/task.entity';

/** Percentage with one decimal, e.g. `42.5%`. */
export function formatPercent(fraction: number): string {
    return `${(Math.round(fraction * 1000) / 10).toFixed(1)}%`;
}

/** Human-readable block for `list` and `show`. */
export function formatTask(task: TaskEntity): string {
    const lines = [
        `${task.id}  ${task.state}`,
        `  source:   ${task.source}`,
    ];
    if (task.name) lines.push(`  name:     ${task.name}`);
    if (task.progress) lines.push(`  progress: ${formatPercent(task.progress.fraction)}`);
    if (task.local_path) lines.push(`  local:    ${task.local_path}`);
    if (task.remote_path) lines.push(`  remote:   ${task.remote_path}`);
    if (task.error) {
        const retry = task.retry_count > 0 ? ` (failures: ${task.retry_count})` : '';
        lines.push(`  error:    ${task.error.code}: ${task.error.message}${retry}`);
    }
    if (task.next_attempt_at) lines.push(`  retry at: ${task.next_attempt_at.toISOString()}`);
    lines.push(`  updated:  ${task.updated_at.toISOString()}`);
    return lines.join('\n');
}
