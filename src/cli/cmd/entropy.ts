import type { Argv } from "yargs"
import { cmd } from "./cmd.js"
import { bootstrap } from "../bootstrap.js"
import { type RequestArgs, toRequest, withLayoutOptions, withProfileOptions } from "./options.js"
import { resolveRequest } from "../../engine/index.js"
import { resolveLayout } from "../../layout/index.js"
import type { ProfileCatalog } from "../../profile/index.js"
import {
  DEFAULT_GUESS_RATE,
  type EntropyReport,
  describeEntropy,
  formatCrackTime,
  formatMagnitude,
} from "../../entropy/index.js"
import { ConfigurationError } from "../../error.js"
import { UI } from "../ui.js"
import { Symbols, padEnd } from "../style.js"

export const EntropyCommand = cmd({
  command: "entropy",
  describe: "explain the entropy of a profile and layout",
  builder: (yargs: Argv) =>
    withLayoutOptions(withProfileOptions(yargs))
      .option("rate", {
        describe: `guesses per second assumed for the search time (default: ${DEFAULT_GUESS_RATE})`,
        type: "number",
      })
      .option("compare", {
        describe: "compare every profile at common layouts",
        type: "boolean",
      }),
  handler: async (args) => {
    await bootstrap(async (ctx) => {
      const rate = checkRate(args.rate)
      if (args.compare) {
        for (const line of compareProfiles(ctx.catalog, rate)) UI.output(line)
        return
      }
      for (const line of explain(args, ctx.settings.profile, ctx.catalog, rate)) UI.output(line)
    })
  },
})

export function checkRate(rate: number | undefined): number {
  if (rate === undefined) return DEFAULT_GUESS_RATE
  if (!Number.isFinite(rate) || rate <= 0) {
    throw new ConfigurationError({
      message: `rate must be a positive number of guesses per second, got ${rate}`,
      parameters: { rate },
    })
  }
  return rate
}

export function explain(args: RequestArgs, fallbackProfile: string, catalog: ProfileCatalog, rate: number): string[] {
  const { profile, plan } = resolveRequest(toRequest(args, fallbackProfile), catalog)
  return renderReport(describeEntropy(profile, plan, rate))
}

export function renderReport(report: EntropyReport): string[] {
  const distinct = [...new Set(report.alphabetSizes)].join(", ")
  return [
    `Profile         ${report.profileId}`,
    `Layout          ${report.layout} (${report.totalLength} chars)`,
    `Random chars    ${report.positions} ${Symbols.times} alphabet of ${distinct}`,
    `Combinations    ${formatMagnitude(report.log10Combinations)}`,
    `Entropy         ${report.bits.toFixed(1)} bits (${report.bitsPerChar.toFixed(2)} bits/char)`,
    `Search time     ${formatCrackTime(report.log10CrackSeconds)} at ${formatMagnitude(Math.log10(report.guessRate))} guesses/s`,
  ]
}

const COMPARE_LAYOUTS: ReadonlyArray<{ segments?: number; segmentLength?: number }> = [
  {},
  { segments: 5, segmentLength: 4 },
  { segments: 4, segmentLength: 5 },
]

/** Every profile at its default layout, 5×4 and 4×5 */
export function compareProfiles(catalog: ProfileCatalog, rate: number): string[] {
  const rows: string[][] = [["profile", "layout", "length", "bits", "search time"]]
  for (const profile of catalog.list()) {
    for (const layout of COMPARE_LAYOUTS) {
      const report = describeEntropy(profile, resolveLayout(layout, profile), rate)
      rows.push([
        report.profileId,
        report.layout,
        String(report.totalLength),
        report.bits.toFixed(1),
        formatCrackTime(report.log10CrackSeconds),
      ])
    }
  }

  const widths = rows[0]?.map((_, col) => Math.max(...rows.map((row) => (row[col] ?? "").length))) ?? []
  return rows.map((row) =>
    row
      .map((cell, col) => padEnd(cell, (widths[col] ?? 0) + 2))
      .join("")
      .trimEnd(),
  )
}
