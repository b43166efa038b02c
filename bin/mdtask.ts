import { main } from '../cli/index';
import { cliLogger as logger } from '@core/utils/logger';

process.title = 'mdtask';

// Let stdio drain instead of calling process.exit
main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('CLI execution failed', {
      error: error instanceof Error ? error.message : String(error)
    });
    process.exitCode = 1;
  });
