import type { SessionOptions } from '../../client.js';
import type { CliConfig } from '../../config.js';
import type { Logger } from '../../logger.js';
import { createDenyListPermission } from './permissions.js';

/** Map resolved CLI configuration onto library session options. */
export function toSessionOptions(config: CliConfig, logger: Logger, sessionName: string): SessionOptions {
  const options: SessionOptions = {
    cliPath: config.cliPath,
    cwd: config.cwd,
    model: config.model,
    permissionMode: config.permissionMode,
    maxTurns: config.maxTurns,
    allowedTools: config.allowedTools,
    logger,
    onStderr: (data) => logger.debug('CLI stderr', { data: data.trimEnd() }),
  };

  if (config.denyTools.length > 0) {
    options.canUseTool = createDenyListPermission(config.denyTools);
  }
  if (config.logDir !== undefined) {
    options.transcript = logger.createTranscriptLogger(sessionName, config.logDir);
  }
  return options;
}
