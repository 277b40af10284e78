#!/usr/bin/env node
import { buildApplication } from "./composition/container";
import { initializeLogging } from "./runtime/logging";
import { buildSettings, loadConfig } from "./config";
import {
  AUDIO_DEVICE,
  CLI,
  DEBUG_MODE,
  OPENAI_TRANSCRIBE_MODEL,
  OPENAI_TRANSLATE_MODEL,
} from "./env";
import { PvRecorderAudioInput, formatDeviceList } from "./adapters/audio/PvRecorderAudioInput";
import { DeviceError, describeError, isFatal } from "./domain/errors";

async function main(): Promise<number> {
  if (CLI.ignored.length) {
    console.warn(`Ignoring unrecognised arguments: ${CLI.ignored.join(" ")}`);
  }

  if (CLI.listDevices) {
    console.log("\nAvailable audio input devices:");
    console.log("-".repeat(50));
    console.log(formatDeviceList(PvRecorderAudioInput.listDevices()));
    return 0;
  }

  const { config: fileConfig, path: configPath } = loadConfig(CLI.configPath);
  if (configPath) {
    console.log(`Loaded config from ${configPath}`);
  } else if (CLI.configPath) {
    console.warn(`Config file ${CLI.configPath} not found; proceeding with defaults.`);
  }

  const settings = buildSettings(fileConfig, CLI, {
    device: AUDIO_DEVICE,
    transcribeModel: OPENAI_TRANSCRIBE_MODEL,
    translateModel: OPENAI_TRANSLATE_MODEL,
  });
  const app = buildApplication(settings, { debug: DEBUG_MODE });

  const onSignal = (signal: NodeJS.Signals) => {
    if (!app.shutdownSignal.running) return;
    console.log("\nShutting down gracefully...");
    app.shutdownSignal.trigger(signal);
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  await app.start();
  await app.pipeline.finished;
  await app.shutdown();

  const fault = app.pipeline.streamFault;
  if (fault) {
    console.error(`\nError: ${describeError(fault)}`);
    return 1;
  }
  return 0;
}

const loggingHandle = initializeLogging(CLI.logFile);
if (loggingHandle.logPath) {
  console.log(`Logging output to ${loggingHandle.logPath}`);
}

main()
  .then((code) => {
    loggingHandle.shutdown();
    process.exit(code);
  })
  .catch((err) => {
    if (isFatal(err)) {
      console.error(`\nError: ${describeError(err)}`);
      if (err instanceof DeviceError) {
        console.error("Use --list-devices to see available devices.");
      }
    } else {
      console.error(err);
    }
    loggingHandle.shutdown();
    process.exit(1);
  });
