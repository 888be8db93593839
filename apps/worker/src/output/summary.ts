// apps/worker/src/output/summary.ts — human-readable cycle report for `run --once`
import pc from "picocolors";
import { formatTarget } from "@commitrelay/core";
import type { CycleReport, RepoCycleReport } from "../poller.js";

function pad(str: string, len: number): string {
  return str.length >= len ? str : str + " ".repeat(len - str.length);
}

function statusDot(status: RepoCycleReport["status"]): string {
  switch (status) {
    case "polled":
      return pc.green("●");
    case "initialized":
      return pc.cyan("●");
    case "failed":
      return pc.red("●");
  }
}

function detail(repo: RepoCycleReport): string {
  switch (repo.status) {
    case "initialized":
      return `${repo.found} historical commits recorded`;
    case "polled":
      return repo.failedDeliveries > 0
        ? `${repo.found} new, ${repo.delivered} sent, ${repo.failedDeliveries} failed`
        : `${repo.found} new, ${repo.delivered} sent`;
    case "failed":
      return repo.error ?? "unknown error";
  }
}

export function formatRepoLine(repo: RepoCycleReport): string {
  const name = pad(formatTarget(repo.target), 32);
  const status = pad(repo.status, 11);
  return `    ${statusDot(repo.status)} ${name} ${status} ${detail(repo)}`;
}

export function printCycleReport(report: CycleReport): void {
  const elapsedSec = (
    (Date.parse(report.finishedAt) - Date.parse(report.startedAt)) /
    1000
  ).toFixed(1);

  console.log("");
  console.log(pc.bold(`  commitrelay cycle — ${report.repos.length} targets in ${elapsedSec}s`));
  console.log("");
  for (const repo of report.repos) {
    console.log(formatRepoLine(repo));
  }
  console.log("");
}
