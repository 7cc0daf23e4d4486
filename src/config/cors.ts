/**
 * cors.ts - Origin policy shared by Express and Socket.IO.
 */

export type OriginCallback = (err: Error | null, allow?: boolean) => void;

export function createOriginValidator(allowedOrigins: string[], production: boolean) {
  return (origin: string | undefined, callback: OriginCallback): void => {
    if (!origin) {
      return callback(null, true);
    }

    if (!production && origin.startsWith('http://localhost')) {
      return callback(null, true);
    }

    if (allowedOrigins.includes(origin)) {
      callback(null, true);
    } else {
      console.warn(`[CORS] Origin not allowed: ${origin}`);
      callback(new Error('Not allowed by CORS'));
    }
  };
}
