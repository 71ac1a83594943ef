import type { HubServer, Logger, ServerOptions } from "./domain.js";
import { createHubServer } from "./server.js";

export type LanshareServiceHandle = {
  server: HubServer;
  stop: () => Promise<void>;
};

export async function startLanshareService(params: ServerOptions = {}): Promise<LanshareServiceHandle> {
  const logger: Logger = params.logger ?? console;
  const server = await createHubServer({ ...params, logger });
  await server.start();
  const settings = server.getSettings();
  logger.info?.(
    `[lanshare] saving to ${settings.save_dir}${settings.requires_code ? " (access code required)" : ""}`,
  );
  return {
    server,
    stop: async () => {
      await server.stop();
      logger.info?.("[lanshare] stopped");
    },
  };
}
