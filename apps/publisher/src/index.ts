// apps/publisher/src/index.ts
import { runPublisher } from "./cli";

runPublisher(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err && typeof err === "object" && "exitCode" in err && typeof err.exitCode === "number") {
      console.error(err instanceof Error ? err.message : String(err));
      process.exit(err.exitCode);
    }
    console.error(String(err instanceof Error ? err.stack : err));
    process.exit(1);
  });
