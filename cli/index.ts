import { CLIOrchestrator, type CLIDependencies } from './CLIOrchestrator';

export type { CLIOptions } from './parsers/ArgumentParser';
export type { CLIDependencies } from './CLIOrchestrator';

/**
 * Run the command line and return the exit status
 */
export async function main(args: readonly string[] = process.argv.slice(2), deps?: CLIDependencies): Promise<number> {
  const orchestrator = new CLIOrchestrator(deps);
  return orchestrator.main(args);
}
