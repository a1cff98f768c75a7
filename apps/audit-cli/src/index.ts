import { createLogger } from "@barlab/core";
import { runAudit } from "./main";

const logger = createLogger("audit-cli");

runAudit(process.argv.slice(2))
	.then((code) => {
		process.exitCode = code;
	})
	.catch((error) => {
		logger.error("cli_unhandled_error", {
			message: error instanceof Error ? error.message : String(error),
			stack: error instanceof Error ? error.stack : undefined,
		});
		process.exitCode = 1;
	});
