import Table from 'cli-table3';
import pc from 'picocolors';
import type { ScanReport } from '@pplaces/repo';
import { summarize, toJsonReport, toRow } from './formatter';

export type ReportView = 'scan' | 'show';

/**
 * Writes command results to stdout, either for people or as JSON.
 */
export class OutputRenderer {
  constructor(
    private readonly isJson: boolean,
    private readonly full: boolean = false,
  ) {}

  renderReport(report: ScanReport, view: ReportView): void {
    if (this.isJson) {
      this.json(toJsonReport(report));
      return;
    }

    if (report.records.length === 0) {
      console.log(pc.gray('No repositories found.'));
    } else if (view === 'scan' && !this.full) {
      this.renderList(report);
    } else {
      this.renderTable(report);
    }

    if (this.full && report.warnings.length > 0) {
      console.log(pc.bold(pc.yellow('\nWarnings:')));
      for (const warning of report.warnings) {
        console.log(`  - [${warning.kind}] ${warning.message}`);
      }
    }

    console.log(pc.gray(summarize(report)));
  }

  renderCloned(path: string): void {
    if (this.isJson) {
      this.json({ status: 'SUCCESS', operation: 'clone', path });
      return;
    }
    console.log(`${pc.green('✅ Cloned into')} ${path}`);
  }

  renderUploaded(path: string, target: string): void {
    if (this.isJson) {
      this.json({ status: 'SUCCESS', operation: 'upload', path, target });
      return;
    }
    console.log(`${pc.green('✅ Uploaded')} ${path} ${pc.green('to')} ${target}`);
  }

  private renderList(report: ScanReport): void {
    for (const record of report.records) {
      const row = toRow(record, report.scannedAt);
      console.log(record.lastCommitTime ? `${row.path} ${pc.gray(`(${row.lastCommit})`)}` : row.path);
    }
  }

  private renderTable(report: ScanReport): void {
    const head = this.full
      ? ['Path', 'Last commit', 'Branch', 'Dirty', 'Remote', 'Issues']
      : ['Path', 'Last commit'];
    const table = new Table({ head });
    for (const record of report.records) {
      const row = toRow(record, report.scannedAt);
      table.push(
        this.full
          ? [row.path, row.lastCommit, row.branch, row.dirty, row.remote, row.issues]
          : [row.path, row.lastCommit],
      );
    }
    console.log(table.toString());
  }

  private json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }
}
