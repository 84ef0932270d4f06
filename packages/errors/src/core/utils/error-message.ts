/**
 * Human-readable message for any thrown value; what ends up in report rows.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name
  if (typeof err === "string") return err

  try {
    return JSON.stringify(err) ?? String(err)
  } catch {
    return String(err)
  }
}
