import { Command, InvalidArgumentError } from "commander";
import type { LanshareConfigInput } from "./lanshare/domain.js";
import { getLanAddress } from "./lanshare/network.js";
import { startLanshareService } from "./lanshare/service.js";

type CliOptions = {
  host?: string;
  port?: number;
  saveDir?: string;
  accessCode?: string;
  trust?: string[];
  trustInterfaces: boolean;
};

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new InvalidArgumentError("port must be an integer between 0 and 65535");
  }
  return port;
}

export function buildConfigInput(options: CliOptions): LanshareConfigInput {
  const input: LanshareConfigInput = {
    network: { trustLocalInterfaces: options.trustInterfaces },
  };
  if (options.port !== undefined) {
    input.port = options.port;
  }
  if (options.host) {
    input.network = { ...input.network, bindAddress: options.host };
  }
  if (options.trust && options.trust.length > 0) {
    input.network = { ...input.network, trustedAddresses: options.trust };
  }
  if (options.saveDir) {
    input.storage = { saveDir: options.saveDir };
  }
  if (options.accessCode !== undefined) {
    input.auth = { accessCode: options.accessCode };
  }
  return input;
}

export function createCli(): Command {
  const program = new Command();

  program
    .name("lanshare")
    .description("Share files and notes with devices on the local network")
    .version("0.1.0")
    .option("--host <address>", "address to bind", "0.0.0.0")
    .option("--port <number>", "port to listen on", parsePort, 8000)
    .option("--save-dir <path>", "directory received files are stored in")
    .option("--access-code <code>", "shared code required to connect and use files")
    .option("--trust <address...>", "extra remote addresses treated as the host")
    .option("--no-trust-interfaces", "only loopback connections get host rights")
    .action(async (options: CliOptions) => {
      const service = await startLanshareService({ config: buildConfigInput(options) });
      const port = service.server.getPort();
      console.info(`[lanshare] open http://${getLanAddress()}:${port} on another device`);
      const shutdown = () => {
        service.stop().then(
          () => process.exit(0),
          (err: unknown) => {
            console.error("[lanshare] shutdown failed", err);
            process.exit(1);
          },
        );
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });

  return program;
}
