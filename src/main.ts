import { createApplicationLayer } from './application';
import { createTelemetryModule } from './adapters/Telemetry';
import { createTerminalRenderModule } from './adapters/TerminalRender';
import { createTickSchedulerModule } from './adapters/TickScheduler';
import { parseCliOptions } from './config/cli-options';
import { createMazeSessionModule } from './domain/MazeSession';
import { toErrorMessage } from './shared/errors';
import {
  createMathRandomSource,
  createSeededRandomSource,
  type RandomSource,
} from './shared/random';

function createRandomSource(seed: number | undefined): RandomSource {
  return seed === undefined ? createMathRandomSource() : createSeededRandomSource(seed);
}

async function bootstrap(): Promise<void> {
  const options = parseCliOptions(process.argv.slice(2));
  const mazeSessionModule = createMazeSessionModule({
    random: createRandomSource(options.seed),
    width: options.width,
    height: options.height,
    solverName: options.solverName,
  });
  const application = createApplicationLayer({ mazeSession: mazeSessionModule });

  if (options.listAlgorithms) {
    const catalog = application.readModel.getAlgorithmCatalog();
    process.stdout.write(
      [
        'Generators:',
        ...catalog.generators.map((name) => `  ${name}`),
        'Solvers:',
        ...catalog.solvers.map((name) => `  ${name}`),
        '',
      ].join('\n'),
    );
    return;
  }

  const telemetryModule = createTelemetryModule(application.events);
  const terminalRenderModule = createTerminalRenderModule(
    application.readModel,
    application.events,
    { output: process.stdout, clearScreen: process.stdout.isTTY },
  );
  const tickSchedulerModule = createTickSchedulerModule(application.commands, application.events, {
    intervalMs: options.intervalMs,
  });

  telemetryModule.start();
  terminalRenderModule.start();

  try {
    const started = application.commands.dispatch({
      type: 'StartGeneration',
      generatorName: options.generatorName,
    });

    if (started.type !== 'ok') {
      throw new Error(`${started.error.code}: ${started.error.message}`);
    }

    const summary = await tickSchedulerModule.start();
    console.info(`[main] Finished after ${summary.ticks} ticks.`);
  } finally {
    tickSchedulerModule.stop();
    terminalRenderModule.stop();
    telemetryModule.stop();
  }
}

void bootstrap().catch((error: unknown) => {
  console.error(`[main] Maze run failed: ${toErrorMessage(error)}`);
  process.exitCode = 1;
});
