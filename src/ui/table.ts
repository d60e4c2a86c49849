import { format, isValid, parseISO } from 'date-fns';
import type { AboutInfo, SessionInfo, VMHandle } from '../vsphere/types.js';

const RULE_WIDE = '='.repeat(90);
const RULE = '='.repeat(40);

function row(name: string, power: string, cpus: string, memory: string, ip: string): string {
  return `${name.padEnd(30)} ${power.padEnd(15)} ${cpus.padEnd(8)} ${memory.padEnd(12)} ${ip}`.trimEnd();
}

/**
 * Inventory table: one row per VM, memory shown in GB.
 */
export function formatVMTable(vms: VMHandle[]): string[] {
  if (vms.length === 0) {
    return ['No VMs found!'];
  }

  return [
    row('VM Name', 'Power State', 'CPUs', 'Memory (GB)', 'IP Address'),
    RULE_WIDE,
    ...vms.map((vm) =>
      row(vm.name, vm.powerState, String(vm.cpuCount), (vm.memoryMB / 1024).toFixed(2), vm.ipAddress ?? 'N/A')
    ),
  ];
}

export function formatVMList(vms: VMHandle[]): string[] {
  return ['VMs managed by vCenter:', ...vms.map((vm) => `  - ${vm.name}`)];
}

export function formatAboutInfo(about: AboutInfo): string[] {
  return [
    '=== vCenter Information ===',
    `Product: ${about.fullName || about.name}`,
    `Vendor: ${about.vendor}`,
    `Version: ${about.version} (build ${about.build})`,
    `API: ${about.apiType} ${about.apiVersion}`,
    `OS Type: ${about.osType}`,
    `Instance UUID: ${about.instanceUuid}`,
    RULE,
  ];
}

function formatLoginTime(value: string): string {
  if (!value) {
    return 'N/A';
  }
  const parsed = parseISO(value);
  return isValid(parsed) ? format(parsed, 'yyyy-MM-dd HH:mm:ss') : value;
}

export function formatSessionInfo(info: SessionInfo, host: string): string[] {
  return [
    '=== Current Session Information ===',
    `DOMAIN/Username: ${info.userName}`,
    `vCenter Server: ${host}`,
    `Source IP Address: ${info.ipAddress}`,
    `Login Time: ${formatLoginTime(info.loginTime)}`,
    RULE,
  ];
}
