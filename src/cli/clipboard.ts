import clipboardy from "clipboardy"

export namespace Clipboard {
  /**
   * Copy text to the system clipboard. Rejects when no clipboard is
   * available (headless Linux without xclip/xsel/wl-copy, for instance).
   */
  export async function copy(text: string): Promise<void> {
    await clipboardy.write(text)
  }
}
