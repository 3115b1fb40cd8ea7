import { INestApplicationContext, Logger } from '@nestjs/common';
import { PortfolioRunService, RunStreams, RunSummary } from './portfolio-run.service';

export type BatchContext = Pick<INestApplicationContext, 'get' | 'close'>;

/**
 * Runs the pipeline in an opened application context and closes the context
 * exactly once afterwards, releasing the store whether the run succeeds or throws.
 */
export async function runBatch(app: BatchContext, streams?: RunStreams): Promise<RunSummary> {
  const logger = new Logger('Batch');
  try {
    const summary = await app.get(PortfolioRunService).run(streams);
    if (summary.failedSteps.length > 0) {
      logger.warn(`Finished with failed steps: ${summary.failedSteps.join(', ')}`);
    } else {
      logger.log('Finished');
    }
    return summary;
  } finally {
    await app.close();
  }
}
