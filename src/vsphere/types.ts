/**
 * Types shared between the vCenter client and the console.
 */

export type TlsPolicy = 'verify' | 'insecure';

export type PowerState = 'poweredOn' | 'poweredOff' | 'suspended';

/**
 * Managed object reference, e.g. `{ type: 'VirtualMachine', value: 'vm-42' }`.
 */
export interface MoRef {
  type: string;
  value: string;
}

/**
 * A VM as seen at listing time. The console reads it, never mutates it.
 */
export interface VMHandle {
  ref: MoRef;
  name: string;
  powerState: PowerState;
  cpuCount: number;
  memoryMB: number;
  ipAddress: string | null;
}

export interface AboutInfo {
  name: string;
  fullName: string;
  vendor: string;
  version: string;
  build: string;
  osType: string;
  apiType: string;
  apiVersion: string;
  instanceUuid: string;
}

export interface SessionInfo {
  userName: string;
  fullName: string;
  ipAddress: string;
  loginTime: string;
}

export type TaskResult =
  | { state: 'success' }
  | { state: 'error' | 'timeout'; error: string };

export interface Task {
  id: string;
  awaitCompletion(timeoutMs?: number): Promise<TaskResult>;
}

export interface SnapshotSpec {
  name: string;
  description: string;
  memory: boolean;
  quiesce: boolean;
}

export interface ReconfigureSpec {
  cpuCount?: number;
  memoryMB?: number;
}

export interface VMDirectory {
  listVMs(nameFilter?: string): Promise<VMHandle[]>;
  /** Current power state, read fresh rather than from the handle. */
  getState(vm: VMHandle): Promise<PowerState>;
  about(): AboutInfo;
  currentSession(): Promise<SessionInfo>;
  disconnect(): Promise<void>;
}

export interface TaskInvoker {
  powerOn(vm: VMHandle): Promise<Task>;
  powerOff(vm: VMHandle): Promise<Task>;
  createSnapshot(vm: VMHandle, spec: SnapshotSpec): Promise<Task>;
  destroy(vm: VMHandle): Promise<Task>;
  reconfigure(vm: VMHandle, spec: ReconfigureSpec): Promise<Task>;
  rename(vm: VMHandle, newName: string): Promise<Task>;
}

export interface VCenterSession extends VMDirectory, TaskInvoker {
  readonly host: string;
}
