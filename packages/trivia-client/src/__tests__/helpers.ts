type ErrorClass<T> = abstract new (...args: never[]) => T

/**
 * Run `fn`, assert it throws an instance of `type` and return that error for inspection
 */
export function thrownBy<T>(fn: () => unknown, type: ErrorClass<T>): T {
  try {
    fn()
  } catch (error) {
    if (error instanceof type) return error
    throw new Error(`Expected ${type.name}, got ${String(error)}`)
  }
  throw new Error(`Expected ${type.name} to be thrown`)
}

export async function rejectionOf<T>(promise: Promise<unknown>, type: ErrorClass<T>): Promise<T> {
  try {
    await promise
  } catch (error) {
    if (error instanceof type) return error
    throw new Error(`Expected ${type.name}, got ${String(error)}`)
  }
  throw new Error(`Expected ${type.name} rejection`)
}
