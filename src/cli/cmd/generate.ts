import type { Argv } from "yargs"
import { cmd } from "./cmd.js"
import { bootstrap, type CliContext } from "../bootstrap.js"
import { type RequestArgs, toRequest, withLayoutOptions, withProfileOptions } from "./options.js"
import { generate, generateMany } from "../../engine/index.js"
import { roundBits } from "../../entropy/index.js"
import type { GeneratedPassword } from "../../synth/index.js"
import { UI } from "../ui.js"
import { Symbols, muted, padEnd } from "../style.js"

export interface GenerateArgs extends RequestArgs {
  count?: number
  copy?: boolean
  entropy?: boolean
  list?: boolean
}

export interface GenerateOutcome {
  passwords: GeneratedPassword[]
  /** undefined when copying was not attempted */
  copied?: boolean
}

export const GenerateCommand = cmd({
  command: ["$0", "generate"],
  describe: "generate passwords (default command)",
  builder: (yargs: Argv) => {
    return withLayoutOptions(withProfileOptions(yargs))
      .option("count", {
        alias: "n",
        describe: "number of passwords to generate (default: 1)",
        type: "number",
      })
      .option("copy", {
        describe: "copy the password to the clipboard when generating one (--no-copy to disable)",
        type: "boolean",
      })
      .option("entropy", {
        alias: "e",
        describe: "print the entropy estimate on stderr",
        type: "boolean",
      })
      .option("list", {
        describe: "show available profiles with examples",
        type: "boolean",
      })
      .example("$0", "Kp4x_Tm9n_Bc2w_Qf7v (default, ~95 bits)")
      .example("$0 --simple", "hn4k_xp2m_b7qf_9dtc (easy to dictate)")
      .example("$0 --paranoid", "Kp4x.Tm9n-Bc2w^Qf7v (max symbols)")
      .example("$0 -n 5", "generate 5 passwords")
      .example("$0 --segments 5", "24 chars, ~119 bits")
      .example("$0 -l 30", "at least 30 chars, rounded up to whole segments")
  },
  handler: async (args) => {
    await bootstrap(async (ctx) => {
      if (args.list) {
        showExamples(ctx)
        return
      }
      await runGenerate(args, ctx)
    })
  },
})

/**
 * Generate, print to stdout, and copy a single result to the clipboard.
 * A clipboard failure is reported but never fails the run.
 */
export async function runGenerate(args: GenerateArgs, ctx: CliContext): Promise<GenerateOutcome> {
  const request = toRequest(args, ctx.settings.profile)
  const count = args.count ?? ctx.settings.count
  const passwords = generateMany(request, count, ctx)

  for (const password of passwords) {
    UI.output(password.text)
  }

  if (args.entropy && passwords[0]) {
    const first = passwords[0]
    UI.println(muted(`${first.profileId}: ${Symbols.approx}${roundBits(first.entropyBits)} bits of entropy`))
  }

  const copy = (args.copy ?? ctx.settings.copy) && passwords.length === 1
  const last = passwords[passwords.length - 1]
  if (!copy || !last) return { passwords }

  try {
    await ctx.copy(last.text)
    UI.success("Copied to clipboard")
    return { passwords, copied: true }
  } catch (e) {
    ctx.logger.warn("clipboard copy failed", { error: e instanceof Error ? e.message : String(e) })
    UI.warn("Could not copy to clipboard (use --no-copy to skip)")
    return { passwords, copied: false }
  }
}

/** One fresh example per profile, unstyled on stdout */
export function showExamples(ctx: CliContext) {
  const width = Math.max(...ctx.catalog.names().map((name) => name.length)) + 2
  UI.output("Available profiles:")
  for (const profile of ctx.catalog.list()) {
    const example = generate({ profile: profile.id }, ctx)
    UI.output(`  ${padEnd(profile.id, width)}${example.text}  (~${roundBits(example.entropyBits)} bits, ${profile.description})`)
  }
}
