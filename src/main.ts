import { ZodError } from "zod";
import { USAGE, runCli } from "./cli";

runCli(process.argv.slice(2)).catch((err: unknown) => {
    if (err instanceof ZodError) {
        console.error(err.issues.map((i) => `${i.path.join(".") || "options"}: ${i.message}`).join("\n"));
        console.error(USAGE);
    } else {
        console.error(err instanceof Error ? err.message : err);
    }
    process.exitCode = 1;
});
