import type { Argv } from "yargs"
import { cmd } from "./cmd.js"
import { bootstrap } from "../bootstrap.js"
import { listProfiles, type ProfileSummary } from "../../engine/index.js"
import { roundBits } from "../../entropy/index.js"
import { UI } from "../ui.js"
import { Symbols, padEnd } from "../style.js"

export const ListCommand = cmd({
  command: "list",
  describe: "list available profiles",
  builder: (yargs: Argv) =>
    yargs.option("json", {
      describe: "print profiles as JSON",
      type: "boolean",
    }),
  handler: async (args) => {
    await bootstrap(async (ctx) => {
      const profiles = listProfiles(ctx.catalog)
      if (args.json) {
        UI.output(JSON.stringify(profiles, null, 2))
        return
      }
      for (const line of renderProfiles(profiles)) UI.output(line)
    })
  },
})

/** Plain text for stdout */
export function renderProfiles(profiles: ProfileSummary[]): string[] {
  const width = Math.max(0, ...profiles.map((p) => p.id.length)) + 2
  return profiles.map((p) => {
    const safety = p.wordSafe ? "" : `  ${Symbols.warning} not double-click safe`
    return `${padEnd(p.id, width)}${p.exampleLayout}  ${Symbols.approx}${roundBits(p.entropyBits)} bits  ${p.description}${safety}`
  })
}
