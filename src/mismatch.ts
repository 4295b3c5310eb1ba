import { formatStatus, type CmdOutput } from './process-runner.js';

export type MismatchReport =
  | {
      mode: 'pipe';
      label: string;
      args: readonly string[];
      subject: CmdOutput;
      reference: CmdOutput;
    }
  | {
      mode: 'file';
      label: string;
      args: readonly string[];
      subjectBytes: Buffer;
      referenceBytes: Buffer;
    };

/** Lossy: invalid UTF-8 sequences become U+FFFD */
export function lossy(bytes: Buffer): string {
  return bytes.toString('utf8');
}

export function renderMismatch(report: MismatchReport): string {
  if (report.mode === 'file') {
    return `${report.label} file output mismatch for args ${JSON.stringify(report.args)} ` +
      `(subject ${report.subjectBytes.length}B vs reference ${report.referenceBytes.length}B)`;
  }

  const { subject, reference } = report;
  return [
    `${report.label} output mismatch for args ${JSON.stringify(report.args)}`,
    `=== subject stdout (${subject.stdout.length}B) ===`,
    lossy(subject.stdout),
    `=== reference stdout (${reference.stdout.length}B) ===`,
    lossy(reference.stdout),
    `=== subject stderr (${subject.stderr.length}B) ===`,
    lossy(subject.stderr),
    `=== reference stderr (${reference.stderr.length}B) ===`,
    lossy(reference.stderr),
    `=== subject status ===`,
    formatStatus(subject),
    `=== reference status ===`,
    formatStatus(reference),
  ].join('\n');
}

export function sameOutput(a: CmdOutput, b: CmdOutput): boolean {
  return a.stdout.equals(b.stdout) &&
    a.stderr.equals(b.stderr) &&
    a.exitCode === b.exitCode &&
    a.signal === b.signal;
}
