/**
 * A SOAP fault returned by vCenter. `message` is the fault string verbatim.
 */
export class VSphereFaultError extends Error {
  readonly faultType: string;
  readonly method: string;

  constructor(method: string, faultType: string, faultString: string) {
    super(faultString);
    this.name = 'VSphereFaultError';
    this.method = method;
    this.faultType = faultType;
  }
}

export class AuthenticationError extends Error {
  readonly username: string;
  readonly host: string;

  constructor(username: string, host: string, detail: string) {
    super(`Authentication failed for ${username}@${host}: ${detail}`);
    this.name = 'AuthenticationError';
    this.username = username;
    this.host = host;
  }
}

/** vim25 fault types that mean the credentials were rejected. */
export const LOGIN_FAULTS = ['InvalidLogin', 'InvalidLoginFault', 'NoPermission', 'NoPermissionFault'];
