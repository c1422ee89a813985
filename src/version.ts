import { readFileSync } from "node:fs"
import { fileURLToPath } from "node:url"

/** Version from package.json, one directory up from both src/ and dist/ */
export const VERSION: string = (() => {
  const file = fileURLToPath(new URL("../package.json", import.meta.url))
  const pkg: unknown = JSON.parse(readFileSync(file, "utf-8"))
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version
  }
  return "0.0.0"
})()
