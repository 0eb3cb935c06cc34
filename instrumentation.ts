/**
 * Runs once when the server boots. The entry migration has to finish before
 * any route serves; if it fails the error escapes here and startup aborts.
 */
export async function register() {
  if (process.env.NEXT_RUNTIME === 'nodejs') {
    const { getEntryService } = await import('@/lib/db')
    await getEntryService()
    console.log('Entry store ready')
  }
}
