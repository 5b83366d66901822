import { z } from "zod";
import { fields } from "../services/validator.js";
import type { PowerAction } from "../types.js";
import { defineTool, vmidArg, type Tool, type ToolContext } from "./registry.js";

const POWER_TOOLS: Array<{ action: PowerAction; description: string; timed?: boolean }> = [
  { action: "start", description: "Start a VM" },
  { action: "stop", description: "Stop a VM immediately" },
  { action: "shutdown", description: "Shut down a VM through ACPI or the guest agent", timed: true },
  { action: "reset", description: "Reset a VM" },
  { action: "reboot", description: "Reboot a VM", timed: true },
  { action: "suspend", description: "Suspend a VM" },
  { action: "resume", description: "Resume a suspended VM" },
];

const vmTarget = {
  node: fields.nonEmpty.describe("Node where the VM is located"),
  vmid: vmidArg.describe("VM ID, e.g. 100 or '100'"),
};

export function vmTools({ dispatcher, agent }: ToolContext): Tool[] {
  const power = POWER_TOOLS.map(({ action, description, timed }) =>
    timed
      ? defineTool({
          name: `${action}_vm`,
          description,
          inputSchema: {
            ...vmTarget,
            timeout: fields.timeout.optional().describe("Seconds Proxmox waits for the guest (1-600)"),
          },
          handler: ({ node, vmid, timeout }, { signal }) =>
            dispatcher.run({ op: "power", action, target: `${node}:${vmid}`, kind: "vm", timeout }, { signal }),
        })
      : defineTool({
          name: `${action}_vm`,
          description,
          inputSchema: vmTarget,
          handler: ({ node, vmid }, { signal }) =>
            dispatcher.run({ op: "power", action, target: `${node}:${vmid}`, kind: "vm" }, { signal }),
        })
  );

  return [
    defineTool({
      name: "create_vm",
      description:
        "Create a VM. The disk format and cloud-init drive follow the storage backend: " +
        "raw without cloud-init on block storage (LVM, ZFS, Ceph), qcow2 with cloud-init on file storage",
      inputSchema: {
        node: fields.nonEmpty.describe("Node to create the VM on"),
        vmid: vmidArg.describe("New VM ID, e.g. 200 or '200'"),
        name: fields.dnsName.optional().describe("VM name"),
        cpus: fields.cpus.describe("CPU cores (1-32)"),
        memory: fields.memory.describe("Memory in MB (512-131072)"),
        disk_size: fields.diskSize.describe("Disk size in GB (5-1000)"),
        storage: fields.nonEmpty.optional().describe("Storage pool; the first pool accepting disk images when omitted"),
        ostype: fields.nonEmpty.optional().describe("Guest OS type (default l26)"),
        disk_format: fields.diskFormat.optional().describe("Override the disk format for the pool"),
      },
      handler: (params, { signal }) => dispatcher.run({ op: "create", kind: "vm", params }, { signal }),
    }),

    defineTool({
      name: "delete_vm",
      description: "Delete a VM. A running VM is only deleted with force, after being stopped",
      inputSchema: {
        ...vmTarget,
        force: z.boolean().optional().describe("Stop the VM first if it is running"),
        purge: z.boolean().optional().describe("Also remove the VM from backup jobs and HA"),
      },
      handler: ({ node, vmid, force, purge }, { signal }) =>
        dispatcher.run(
          { op: "delete", target: `${node}:${vmid}`, kind: "vm", force: force ?? false, purge: purge ?? false },
          { signal }
        ),
    }),

    defineTool({
      name: "execute_vm_command",
      description:
        "Run a shell command inside a VM through the QEMU guest agent and return its exit code and output. " +
        "The guest agent must be installed and running",
      inputSchema: {
        ...vmTarget,
        command: z.string().min(1, "must not be empty").describe("Shell command, e.g. 'uname -a'"),
        timeout_seconds: fields.timeout.optional().describe("Seconds to wait for the command (1-600)"),
      },
      handler: ({ node, vmid, command, timeout_seconds }, { signal }) =>
        agent.run({ node, vmid, command }, { signal, timeoutSeconds: timeout_seconds }),
    }),

    ...power,
  ];
}
