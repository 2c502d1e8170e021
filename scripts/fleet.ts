#!/usr/bin/env tsx

/**
 * Fleet entry maintenance and one-shot polling
 *
 * Usage:
 *   npm run fleet -- list
 *   npm run fleet -- add "Garage" ./entry.json
 *   npm run fleet -- poll <entryId>
 *   npm run fleet -- transition <entryId>                     # list options
 *   npm run fleet -- transition <entryId> hybrid --set hybridLocalType=modbus --set modbusHost=192.168.1.50
 */

import { config } from "dotenv";
config({ path: ".env.local" });

import { readFileSync } from "fs";
import { Command } from "commander";
import { FleetEntriesManager } from "../lib/fleet-entries-manager";
import { FleetRuntime } from "../lib/fleet-runtime";
import { closeDatabase } from "../lib/db";
import { errorMessage } from "../lib/errors";
import { toPrettyJson } from "../lib/json";
import type { FlowResult, FormValues, TransitionSide } from "../lib/transitions/types";

const TRANSITION_TARGETS: readonly TransitionSide[] = ["http", "hybrid", "local", "modbus", "dongle"];
const MAX_FORM_ROUNDS = 10;

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseAssignments(assignments: string[]): FormValues {
  const values: FormValues = {};
  for (const assignment of assignments) {
    const separator = assignment.indexOf("=");
    if (separator <= 0) {
      throw new Error(`Expected key=value, got "${assignment}"`);
    }
    values[assignment.slice(0, separator)] = assignment.slice(separator + 1);
  }
  return values;
}

function isTransitionSide(value: string): value is TransitionSide {
  return TRANSITION_TARGETS.some((target) => target === value);
}

function printResult(result: FlowResult) {
  switch (result.type) {
    case "form":
      console.log(`Form ${result.stepId}`);
      if (Object.keys(result.errors).length > 0) {
        console.log("  Errors:", result.errors);
      }
      console.log("  Placeholders:", result.placeholders);
      break;
    case "abort":
      console.log(`Aborted: ${result.reason}`);
      break;
    case "success":
      console.log(`Done: ${result.entry.title}`);
      console.log(toPrettyJson(result.entry.data));
      break;
  }
}

async function listEntries(manager: FleetEntriesManager) {
  const entries = await manager.listEntries();
  if (entries.length === 0) {
    console.log("No fleet entries");
    return;
  }
  for (const entry of entries) {
    const status = await manager.getPollingStatus(entry.id);
    const lastPoll = status?.lastPollTime ? status.lastPollTime.toISOString() : "never";
    console.log(`${entry.id}  ${entry.data.connectionType.padEnd(6)}  ${entry.title}  (last poll: ${lastPoll})`);
  }
}

async function pollOnce(runtime: FleetRuntime, entryId: string) {
  const coordinator = await runtime.load(entryId);
  const result = await coordinator.refresh();

  console.log(`Cycle ${result.success ? "succeeded" : "failed"} in ${result.durationMs}ms`);
  for (const failed of result.failedDevices) {
    console.log(`  ${failed.serial}: ${failed.error}`);
  }
  if (result.needsReauthentication) {
    console.log("  Cloud credentials need to be re-entered");
  }
  if (result.snapshot) {
    console.log(toPrettyJson(result.snapshot));
  }
}

async function runTransition(
  runtime: FleetRuntime,
  entryId: string,
  target: string | undefined,
  values: FormValues,
) {
  const router = runtime.transitions(entryId);

  if (!target) {
    printResult(await router.select());
    return;
  }
  if (!isTransitionSide(target)) {
    throw new Error(`Unknown target "${target}" (expected ${TRANSITION_TARGETS.join(", ")})`);
  }

  let result = await router.begin(target);
  let submitted = "";

  for (let round = 0; round < MAX_FORM_ROUNDS && result.type === "form"; round++) {
    // The same form coming back means the submitted values were rejected
    if (result.stepId === submitted && Object.keys(result.errors).length > 0) {
      break;
    }
    submitted = result.stepId;
    printResult(result);
    result = await router.step(result.stepId, { ...result.values, ...values });
  }

  printResult(result);
  if (result.type !== "success") {
    router.cancel();
    process.exitCode = 1;
  }
}

async function main() {
  const manager = new FleetEntriesManager();
  const runtime = new FleetRuntime(manager, { autoStart: false });

  const program = new Command();
  program.name("fleet").description("Manage and poll inverter fleet entries");

  program
    .command("list")
    .description("List fleet entries with their last poll time")
    .action(() => listEntries(manager));

  program
    .command("add")
    .description("Create an entry from a JSON data file")
    .argument("<title>", "Entry title")
    .argument("<file>", "JSON file holding the entry data")
    .action(async (title: string, file: string) => {
      const entry = await manager.createEntry(title, JSON.parse(readFileSync(file, "utf-8")));
      console.log(`Created ${entry.id}`);
    });

  program
    .command("poll")
    .description("Run one poll cycle and print the snapshot")
    .argument("<entryId>", "Entry to poll")
    .action((entryId: string) => pollOnce(runtime, entryId));

  program
    .command("transition")
    .description("Change an entry's connection mode or local transport")
    .argument("<entryId>", "Entry to change")
    .argument("[target]", `One of ${TRANSITION_TARGETS.join(", ")}`)
    .option("--set <key=value>", "Form value (repeatable)", collect, [])
    .action((entryId: string, target: string | undefined, options: { set: string[] }) =>
      runTransition(runtime, entryId, target, parseAssignments(options.set)),
    );

  try {
    await program.parseAsync();
  } finally {
    await runtime.shutdown();
    closeDatabase();
  }
}

main().catch((error) => {
  console.error("[fleet]", errorMessage(error));
  process.exit(1);
});
