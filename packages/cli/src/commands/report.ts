import { ScanAggregator } from '@pplaces/repo';
import type { CliContext } from '../context';
import type { ReportView } from '../output/renderer';

export async function runReport(ctx: CliContext, root: string, view: ReportView): Promise<void> {
  const aggregator = new ScanAggregator({
    inspector: ctx.inspector,
    logger: ctx.logger,
    runId: ctx.runId,
  });
  const report = await aggregator.aggregate(
    root,
    { daysToShow: ctx.config.scan.daysToShow, full: ctx.globals.full === true },
    ctx.scanOptions,
  );
  ctx.renderer.renderReport(report, view);
}
