import { isAxiosError } from 'axios';
import { VSphereFaultError } from '../vsphere/errors.js';

/**
 * Turns anything thrown by the vCenter client into the line shown to the
 * operator. Fault strings are passed through unchanged.
 */
export function describeError(error: unknown): string {
  if (error instanceof VSphereFaultError) {
    return error.message;
  }

  if (isAxiosError(error)) {
    const status = error.response?.status;
    if (status) {
      return `HTTP ${status} from vCenter: ${error.message}`;
    }
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
