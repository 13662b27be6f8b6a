import fs from "node:fs/promises"
import path from "node:path"

export type FileLocation = {
  file: string
  required: boolean
  cwd?: string | undefined
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

/** Returns `undefined` when an optional file does not exist. */
export async function readOptionalFile({
  file,
  required,
  cwd,
}: FileLocation): Promise<string | undefined> {
  const filePath = path.resolve(cwd ?? process.cwd(), file)

  try {
    return await fs.readFile(filePath, "utf-8")
  } catch (err) {
    if (!required && isMissingFile(err)) return undefined
    throw err
  }
}
