import type { AxiosAdapter } from 'axios';
import { AuthenticationError, LOGIN_FAULTS, VSphereFaultError } from './errors.js';
import {
  asArray,
  attr,
  child,
  moRefNode,
  parseMoRef,
  SoapTransport,
  text,
  typedNode,
  type XmlElement,
} from './soap.js';
import { DEFAULT_POLL_INTERVAL_MS, PolledTask, type TaskInfo, type TaskState } from './task.js';
import type {
  AboutInfo,
  MoRef,
  PowerState,
  ReconfigureSpec,
  SessionInfo,
  SnapshotSpec,
  Task,
  TlsPolicy,
  VCenterSession,
  VMHandle,
} from './types.js';

const SERVICE_INSTANCE: MoRef = { type: 'ServiceInstance', value: 'ServiceInstance' };

const VM_PROPERTIES = [
  'name',
  'runtime.powerState',
  'config.hardware.numCPU',
  'config.hardware.memoryMB',
  'guest.ipAddress',
];

const TASK_PROPERTIES = ['info.state', 'info.error', 'info.progress'];

const POWER_STATES: readonly PowerState[] = ['poweredOn', 'poweredOff', 'suspended'];
const TASK_STATES: readonly TaskState[] = ['queued', 'running', 'success', 'error'];

export interface ConnectOptions {
  host: string;
  username: string;
  password: string;
  tlsPolicy: TlsPolicy;
  pollIntervalMs?: number;
  apiVersion?: string;
  adapter?: AxiosAdapter;
  trace?: (line: string) => void;
}

interface ServiceContent {
  rootFolder: MoRef;
  propertyCollector: MoRef;
  viewManager: MoRef;
  sessionManager: MoRef;
  about: AboutInfo;
}

interface ObjectContent {
  obj: MoRef | undefined;
  props: Map<string, unknown>;
}

/**
 * Case-insensitive substring filter used for every VM name lookup.
 */
export function filterByName(vms: VMHandle[], nameFilter?: string): VMHandle[] {
  if (!nameFilter) {
    return vms;
  }
  const needle = nameFilter.toLowerCase();
  return vms.filter((vm) => vm.name.toLowerCase().includes(needle));
}

function requireMoRef(node: unknown, field: string): MoRef {
  const ref = parseMoRef(child(node, field));
  if (!ref) {
    throw new Error(`ServiceContent is missing ${field}`);
  }
  return ref;
}

function parseServiceContent(node: unknown): ServiceContent {
  const about = child(node, 'about');
  const field = (name: string): string => text(child(about, name)) ?? '';

  return {
    rootFolder: requireMoRef(node, 'rootFolder'),
    propertyCollector: requireMoRef(node, 'propertyCollector'),
    viewManager: requireMoRef(node, 'viewManager'),
    sessionManager: requireMoRef(node, 'sessionManager'),
    about: {
      name: field('name'),
      fullName: field('fullName'),
      vendor: field('vendor'),
      version: field('version'),
      build: field('build'),
      osType: field('osType'),
      apiType: field('apiType'),
      apiVersion: field('apiVersion'),
      instanceUuid: field('instanceUuid'),
    },
  };
}

function propertyFilter(type: string, pathSet: string[], obj: MoRef, traverseView: boolean): XmlElement {
  const objectSet: XmlElement = { obj: moRefNode(obj), skip: String(traverseView) };
  if (traverseView) {
    objectSet.selectSet = typedNode('TraversalSpec', {
      name: 'traverseView',
      type: 'ContainerView',
      path: 'view',
      skip: 'false',
    });
  }
  return {
    specSet: { propSet: { type, pathSet }, objectSet },
    options: {},
  };
}

function parseRetrieveResult(returnval: unknown): { objects: ObjectContent[]; token?: string } {
  const objects = asArray(child(returnval, 'objects')).map((node) => ({
    obj: parseMoRef(child(node, 'obj')),
    props: new Map(
      asArray(child(node, 'propSet')).map((prop): [string, unknown] => [
        text(child(prop, 'name')) ?? '',
        child(prop, 'val'),
      ])
    ),
  }));
  return { objects, token: text(child(returnval, 'token')) };
}

function toPowerState(value: string | undefined): PowerState {
  // Unknown states must never read as poweredOff: delete and reconfigure rely on it.
  return POWER_STATES.find((state) => state === value) ?? 'suspended';
}

function toNumber(node: unknown): number {
  const value = Number(text(node));
  return Number.isFinite(value) ? value : 0;
}

function toVMHandle(object: ObjectContent): VMHandle | undefined {
  if (!object.obj) {
    return undefined;
  }
  const ip = text(object.props.get('guest.ipAddress'));
  return {
    ref: object.obj,
    name: text(object.props.get('name')) ?? object.obj.value,
    powerState: toPowerState(text(object.props.get('runtime.powerState'))),
    cpuCount: toNumber(object.props.get('config.hardware.numCPU')),
    memoryMB: toNumber(object.props.get('config.hardware.memoryMB')),
    ipAddress: ip ? ip : null,
  };
}

/**
 * Message of a LocalizedMethodFault, falling back to the fault's type.
 */
function describeLocalizedFault(node: unknown): string | undefined {
  if (node === undefined || node === '') {
    return undefined;
  }
  return text(child(node, 'localizedMessage')) ?? attr(child(node, 'fault'), 'xsi:type') ?? 'Unknown task error';
}

class SoapSession implements VCenterSession {
  constructor(
    private readonly transport: SoapTransport,
    private readonly content: ServiceContent,
    private readonly pollIntervalMs: number,
    private readonly trace?: (line: string) => void
  ) {}

  get host(): string {
    return this.transport.host;
  }

  about(): AboutInfo {
    return this.content.about;
  }

  async currentSession(): Promise<SessionInfo> {
    const [object] = await this.retrieve(
      propertyFilter('SessionManager', ['currentSession'], this.content.sessionManager, false)
    );
    const session = object?.props.get('currentSession');
    if (session === undefined) {
      throw new Error('vCenter reports no current session');
    }
    const field = (name: string): string => text(child(session, name)) ?? '';
    return {
      userName: field('userName'),
      fullName: field('fullName'),
      ipAddress: field('ipAddress'),
      loginTime: field('loginTime'),
    };
  }

  async listVMs(nameFilter?: string): Promise<VMHandle[]> {
    const view = parseMoRef(
      await this.transport.call('CreateContainerView', this.content.viewManager, {
        container: moRefNode(this.content.rootFolder),
        type: 'VirtualMachine',
        recursive: 'true',
      })
    );
    if (!view) {
      throw new Error('CreateContainerView returned no view');
    }

    try {
      const objects = await this.retrieve(propertyFilter('VirtualMachine', VM_PROPERTIES, view, true));
      const vms = objects
        .map(toVMHandle)
        .filter((vm): vm is VMHandle => vm !== undefined);
      return filterByName(vms, nameFilter);
    } finally {
      try {
        await this.transport.call('DestroyView', view);
      } catch (error) {
        this.trace?.(`DestroyView ${view.value} failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }

  async getState(vm: VMHandle): Promise<PowerState> {
    const [object] = await this.retrieve(propertyFilter('VirtualMachine', ['runtime.powerState'], vm.ref, false));
    return toPowerState(text(object?.props.get('runtime.powerState')));
  }

  async disconnect(): Promise<void> {
    await this.transport.call('Logout', this.content.sessionManager);
  }

  powerOn(vm: VMHandle): Promise<Task> {
    return this.startTask('PowerOnVM_Task', vm);
  }

  powerOff(vm: VMHandle): Promise<Task> {
    return this.startTask('PowerOffVM_Task', vm);
  }

  createSnapshot(vm: VMHandle, spec: SnapshotSpec): Promise<Task> {
    return this.startTask('CreateSnapshot_Task', vm, {
      name: spec.name,
      description: spec.description,
      memory: String(spec.memory),
      quiesce: String(spec.quiesce),
    });
  }

  destroy(vm: VMHandle): Promise<Task> {
    return this.startTask('Destroy_Task', vm);
  }

  reconfigure(vm: VMHandle, spec: ReconfigureSpec): Promise<Task> {
    // VirtualMachineConfigSpec is a sequence: numCPUs precedes memoryMB.
    const configSpec: XmlElement = {};
    if (spec.cpuCount !== undefined) {
      configSpec.numCPUs = String(spec.cpuCount);
    }
    if (spec.memoryMB !== undefined) {
      configSpec.memoryMB = String(spec.memoryMB);
    }
    return this.startTask('ReconfigVM_Task', vm, { spec: configSpec });
  }

  rename(vm: VMHandle, newName: string): Promise<Task> {
    return this.startTask('Rename_Task', vm, { newName });
  }

  private async startTask(method: string, vm: VMHandle, args: XmlElement = {}): Promise<Task> {
    const ref = parseMoRef(await this.transport.call(method, vm.ref, args));
    if (!ref) {
      throw new Error(`${method} on ${vm.name} returned no task`);
    }
    return new PolledTask(ref.value, () => this.taskInfo(ref), this.pollIntervalMs, this.trace);
  }

  private async taskInfo(ref: MoRef): Promise<TaskInfo> {
    const [object] = await this.retrieve(propertyFilter('Task', TASK_PROPERTIES, ref, false));
    const rawState = text(object?.props.get('info.state'));
    const state = TASK_STATES.find((candidate) => candidate === rawState);
    if (!state) {
      throw new Error(`Unexpected state '${rawState ?? ''}' for task ${ref.value}`);
    }
    const progress = object?.props.get('info.progress');
    return {
      state,
      error: describeLocalizedFault(object?.props.get('info.error')),
      progress: progress === undefined ? undefined : toNumber(progress),
    };
  }

  /**
   * RetrievePropertiesEx, following continuation tokens until exhausted.
   */
  private async retrieve(filter: XmlElement): Promise<ObjectContent[]> {
    const collector = this.content.propertyCollector;
    let page = parseRetrieveResult(await this.transport.call('RetrievePropertiesEx', collector, filter));
    const objects = [...page.objects];

    while (page.token) {
      page = parseRetrieveResult(
        await this.transport.call('ContinueRetrievePropertiesEx', collector, { token: page.token })
      );
      objects.push(...page.objects);
    }
    return objects;
  }
}

/**
 * Opens a vim25 session: fetches the service content, then logs in.
 * Rejected credentials surface as {@link AuthenticationError}.
 */
export async function connect(options: ConnectOptions): Promise<VCenterSession> {
  const transport = new SoapTransport({
    host: options.host,
    tlsPolicy: options.tlsPolicy,
    apiVersion: options.apiVersion,
    adapter: options.adapter,
    trace: options.trace,
  });

  const content = parseServiceContent(await transport.call('RetrieveServiceContent', SERVICE_INSTANCE));

  try {
    await transport.call('Login', content.sessionManager, {
      userName: options.username,
      password: options.password,
    });
  } catch (error) {
    if (error instanceof VSphereFaultError && LOGIN_FAULTS.includes(error.faultType)) {
      throw new AuthenticationError(options.username, options.host, error.message);
    }
    throw error;
  }

  return new SoapSession(transport, content, options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS, options.trace);
}
