// apps/publisher/src/cli.ts
import { CliUsageError, makeArgvHelpers } from "cli-utils";
import { mergeConfigSources, parsePublisherConfig, readConfigFile } from "./config";
import { normRel, resolveFromRoot } from "./fsUtils";
import { consoleLog, type PublishLog } from "./log";
import { publishScanResults } from "./publisher";
import { createRunDirectoryHistory, runArtifactsDir } from "./runHistory";

export const HELP_TEXT = `
Usage:
  publisher --workspace <dir> --artifactsRoot <dir> --runId <n> [options]

Required:
  --workspace      Workspace the scan ran in (source paths are shortened against it)
  --artifactsRoot  Archive root; this run's artifacts go to <artifactsRoot>/<runId>
  --runId          Run number (integer >= 1); the previous run is the highest lower number

Optional:
  --outputFolder   scan-build output folder, relative to the workspace (overrides config)
  --bugThreshold   Bug count above which the run is marked unstable (default: 0)
  --markUnstable   Enable the threshold check
  --config         JSON file with scanBuildOutputFolder, markBuildUnstableWhenThresholdIsExceeded, bugThreshold
  --help, -h       Show this help

Exit codes:
  0  success
  1  runtime error
  2  bad arguments / config
  3  bug threshold exceeded (mark the run unstable)
`.trim();

export const EXIT_THRESHOLD_EXCEEDED = 3;

const ALLOWED = new Set([
  "--workspace",
  "--artifactsRoot",
  "--runId",
  "--outputFolder",
  "--bugThreshold",
  "--markUnstable",
  "--config",
  "--help",
]);

export async function runPublisher(argv: string[], opts: { cwd?: string; log?: PublishLog } = {}): Promise<number> {
  const projectRoot = opts.cwd ?? process.env.INIT_CWD ?? process.cwd();
  const log = opts.log ?? consoleLog;
  const { hasFlag, getArg, requireArg, assertNoUnknownOptions, assertHasValue, parseIntFlag } = makeArgvHelpers(argv, HELP_TEXT);

  if (hasFlag("--help", "-h")) {
    console.log(HELP_TEXT);
    return 0;
  }

  assertNoUnknownOptions(ALLOWED);
  assertHasValue("--workspace", "--artifactsRoot", "--runId", "--outputFolder", "--bugThreshold", "--config");

  const workspaceDir = resolveFromRoot(projectRoot, requireArg("--workspace"));
  const artifactsRoot = resolveFromRoot(projectRoot, requireArg("--artifactsRoot"));
  const runId = parseIntFlag("--runId", { min: 1 });
  if (runId === null) throw new CliUsageError(`Missing required argument: --runId\n\n${HELP_TEXT}`);

  const configPath = getArg("--config");
  const fromFile = configPath ? await readConfigFile(resolveFromRoot(projectRoot, configPath)) : {};
  const fromFlags: Record<string, unknown> = {
    scanBuildOutputFolder: getArg("--outputFolder") ?? undefined,
    bugThreshold: parseIntFlag("--bugThreshold", { min: 0 }) ?? undefined,
    markBuildUnstableWhenThresholdIsExceeded: hasFlag("--markUnstable") ? true : undefined,
  };
  const config = parsePublisherConfig(mergeConfigSources(fromFile, fromFlags));

  const artifactsDir = runArtifactsDir(artifactsRoot, runId);
  const result = await publishScanResults({
    config,
    runId,
    workspaceDir,
    artifactsDir,
    previousRun: createRunDirectoryHistory({ artifactsRoot, outputFolder: config.scanBuildOutputFolder, log }),
    log,
  });

  log.info(`bug summary: ${normRel(projectRoot, result.summaryPath)}`);
  if (result.verdict.exceeded) {
    log.info(`bug threshold ${result.verdict.threshold} exceeded with ${result.verdict.bugCount} bugs; mark run ${runId} unstable`);
    return EXIT_THRESHOLD_EXCEEDED;
  }
  return 0;
}
