export type GoogleCastModule = typeof import('@lox-audioserver/node-googlecast');

let modulePromise: Promise<GoogleCastModule> | null = null;

/**
 * Loads the Cast client on first use; a failed load is retried on the next call.
 */
export const loadGoogleCastModule = async (): Promise<GoogleCastModule> => {
  if (!modulePromise) {
    modulePromise = import('@lox-audioserver/node-googlecast').catch((error: unknown) => {
      modulePromise = null;
      throw error;
    });
  }
  return modulePromise;
};
