// Remote scripts report progress as marker lines: ::step::<name>::<ok|failed|skipped>,
// ::probe::<tool>::<present|missing>, ::stage::<name>, ::log::<path>, ::done::<what>.
// Anything else on stdout is ordinary command output.

export type StepStatus = 'ok' | 'failed' | 'skipped';

export interface StepRecord {
  name: string;
  status: StepStatus;
}

export interface MarkerReport {
  steps: StepRecord[];
  probes: Record<string, boolean>;
  stages: string[];
  done: string[];
  remoteLog: string | null;
}

const MARKER = /^::(step|probe|stage|log|done)::([^:\s][^\n]*?)(?:::([a-z]+))?\s*$/;

function isStepStatus(value: string): value is StepStatus {
  return value === 'ok' || value === 'failed' || value === 'skipped';
}

export function parseMarkers(stdout: string): MarkerReport {
  const report: MarkerReport = { steps: [], probes: {}, stages: [], done: [], remoteLog: null };
  for (const line of stdout.split('\n')) {
    const match = MARKER.exec(line.trim());
    if (!match) continue;
    const [, kind, subject, value] = match;
    switch (kind) {
      case 'step':
        if (value !== undefined && isStepStatus(value)) report.steps.push({ name: subject, status: value });
        break;
      case 'probe':
        if (value === 'present' || value === 'missing') report.probes[subject] = value === 'present';
        break;
      case 'stage':
        report.stages.push(subject);
        break;
      case 'done':
        report.done.push(subject);
        break;
      case 'log':
        report.remoteLog = subject;
        break;
    }
  }
  return report;
}

/** Output with marker lines removed, for logging. */
export function stripMarkers(stdout: string): string {
  return stdout
    .split('\n')
    .filter((line) => !MARKER.test(line.trim()))
    .join('\n')
    .trim();
}
