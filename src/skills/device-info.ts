import os from "node:os";
import type { Skill, SkillDescriptor, SkillOutput } from "./types.js";

export interface DeviceInfo {
  platform: string;
  release: string;
  arch: string;
  cpuModel: string;
  cpuCount: number;
  totalMemoryGb: number;
  freeMemoryGb: number;
  uptimeHours: number;
  homeDir: string;
}

function gb(bytes: number): number {
  return Math.round((bytes / 1024 ** 3) * 10) / 10;
}

export function collectDeviceInfo(): DeviceInfo {
  const cpus = os.cpus();
  return {
    platform: os.platform(),
    release: os.release(),
    arch: os.arch(),
    cpuModel: cpus[0]?.model.trim() ?? "unknown",
    cpuCount: cpus.length,
    totalMemoryGb: gb(os.totalmem()),
    freeMemoryGb: gb(os.freemem()),
    uptimeHours: Math.round((os.uptime() / 3600) * 10) / 10,
    homeDir: os.homedir(),
  };
}

export function formatDeviceInfo(info: DeviceInfo): string {
  return [
    `OS: ${info.platform} ${info.release} (${info.arch})`,
    `CPU: ${info.cpuModel} × ${info.cpuCount}`,
    `Memory: ${info.freeMemoryGb} GB free of ${info.totalMemoryGb} GB`,
    `Uptime: ${info.uptimeHours} h`,
    `Home: ${info.homeDir}`,
  ].join("\n");
}

/** device_info: a short read-only summary of this machine */
export class DeviceInfoSkill implements Skill {
  readonly descriptor: SkillDescriptor = {
    id: "device_info",
    name: "Device Info",
    description: "Summarize this computer's OS, CPU, memory and uptime",
    modes: ["fix"],
    permissionLevel: "Safe",
  };

  private readonly collect: () => DeviceInfo;

  constructor(collect: () => DeviceInfo = collectDeviceInfo) {
    this.collect = collect;
  }

  async execute(): Promise<SkillOutput> {
    const info = this.collect();
    return { resultType: "mixed", text: formatDeviceInfo(info), data: info };
  }
}
