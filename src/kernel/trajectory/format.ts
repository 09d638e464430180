import type { TrajectorySnapshot } from './types.ts';

// Renders a trajectory the way it would have looked in a terminal.
export function formatTrajectory(snapshot: TrajectorySnapshot): string {
  let out = '';
  if (snapshot.truncated) {
    out += `# ${snapshot.dropped} earlier command(s) not shown\n`;
  }

  for (const record of snapshot.records) {
    const suffix = record.mode === 'standalone' ? '  # standalone' : '';
    out += `$ ${record.command}${suffix}\n`;

    if (record.exit_code === null) {
      out += `Status: command did not complete (${record.error ?? 'unknown error'})\n`;
      continue;
    }
    const output = record.stdout + record.stderr;
    if (output.length > 0) {
      out += output.endsWith('\n') ? output : `${output}\n`;
    }
  }
  return out;
}
