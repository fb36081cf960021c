import path from "node:path";
import { fileURLToPath } from "node:url";
import {
	ConfigValidationError,
	createLogger,
	loadEnvFiles,
	refreshLoggerSettings,
} from "@papertape/core";
import { TradingSession } from "@papertape/runtime";
import { loadServerConfig } from "./loadConfig";
import { createTraderServer } from "./server";

const logger = createLogger("trader-server");

const projectRoot = path.resolve(
	path.dirname(fileURLToPath(import.meta.url)),
	"../../.."
);

const main = async (): Promise<void> => {
	const envFiles = loadEnvFiles(projectRoot);
	refreshLoggerSettings();
	logger.info("server_start", {
		env: process.env.NODE_ENV ?? "development",
		pid: process.pid,
		envFiles,
	});

	const { trader, port, configPath } = loadServerConfig();
	logger.info("trader_config", {
		configPath,
		symbols: trader.symbols,
		intervalMs: trader.intervalMs,
		provider: trader.provider.type,
		strategy: trader.strategy,
		startingCash: trader.broker.startingCash,
	});

	const session = new TradingSession(trader);
	const server = createTraderServer(session);
	const boundPort = await server.listen(port);
	logger.info("server_listening", { port: boundPort });
	session.start();

	let shuttingDown = false;
	const shutdown = async (reason: string): Promise<void> => {
		if (shuttingDown) {
			return;
		}
		shuttingDown = true;
		logger.info("server_shutdown", { reason });
		await session.shutdown();
		await server.close();
	};

	for (const signal of ["SIGINT", "SIGTERM"] as const) {
		process.once(signal, () => {
			shutdown(signal)
				.then(() => process.exit(0))
				.catch((error) => {
					logger.error("server_shutdown_failed", {
						message: error instanceof Error ? error.message : String(error),
					});
					process.exit(1);
				});
		});
	}
};

main().catch((error) => {
	logger.error("server_fatal", {
		message: error instanceof Error ? error.message : String(error),
		issues: error instanceof ConfigValidationError ? error.issues : undefined,
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exit(1);
});
