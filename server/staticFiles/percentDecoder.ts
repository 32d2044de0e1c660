import { DecodeError } from "../utils/errors";

export function percentDecode(candidate: string): string {
  try {
    return decodeURIComponent(candidate);
  } catch (error) {
    if (error instanceof URIError) {
      throw new DecodeError(candidate);
    }
    throw error;
  }
}
