import { z } from "zod";
import { NotFoundError } from "../errors.js";
import type { ClusterResource } from "../proxmox/types.js";
import { readContainerStats } from "../services/stats.js";
import { fields } from "../services/validator.js";
import { defineTool, read, type Tool, type ToolContext } from "./registry.js";

const seg = encodeURIComponent;

// Read-only status tools. Results are the Proxmox payloads as returned.
export function clusterTools({ backend, logger }: ToolContext): Tool[] {
  const guests = async (type: ClusterResource["type"], node?: string) => {
    const resources = await backend.listResources();
    return resources
      .filter((r) => r.type === type && (!node || r.node === node))
      .sort((a, b) => a.vmid - b.vmid);
  };

  return [
    defineTool({
      name: "get_nodes",
      description: "List the nodes of the Proxmox cluster with their status",
      inputSchema: {},
      handler: () => read(() => backend.listNodes()),
    }),

    defineTool({
      name: "get_node_status",
      description: "Get detailed status of one Proxmox node",
      inputSchema: {
        node: fields.nonEmpty.describe("Node name"),
      },
      handler: ({ node }) => read(() => backend.request({ method: "get", path: `/nodes/${seg(node)}/status` })),
    }),

    defineTool({
      name: "get_cluster_status",
      description: "Get Proxmox cluster status",
      inputSchema: {},
      handler: () => read(() => backend.request({ method: "get", path: "/cluster/status" })),
    }),

    defineTool({
      name: "get_storage",
      description: "List storage pools, cluster wide or as seen by one node",
      inputSchema: {
        node: fields.nonEmpty.optional().describe("Node name (optional)"),
      },
      handler: ({ node }) =>
        read(() => (node ? backend.listStorage(node) : backend.request({ method: "get", path: "/storage" }))),
    }),

    defineTool({
      name: "get_vms",
      description: "List VMs across the cluster",
      inputSchema: {
        node: fields.nonEmpty.optional().describe("Only VMs on this node"),
      },
      handler: ({ node }) => read(() => guests("qemu", node)),
    }),

    defineTool({
      name: "get_containers",
      description: "List LXC containers across the cluster, with live CPU and memory figures by default",
      inputSchema: {
        node: fields.nonEmpty.optional().describe("Only containers on this node"),
        include_stats: z
          .boolean()
          .optional()
          .describe("Add live CPU and memory figures, falling back to RRD samples (default true)"),
        include_raw: z.boolean().optional().describe("With stats, also attach the raw status and config"),
      },
      handler: ({ node, include_stats, include_raw }) =>
        read(async () => {
          const containers = await guests("lxc", node);
          if (include_stats === false) return containers;
          return Promise.all(
            containers.map(async (ct) => ({
              ...ct,
              ...(await readContainerStats(backend, logger, ct.node, ct.vmid, include_raw ?? false)),
            }))
          );
        }),
    }),

    defineTool({
      name: "get_task_status",
      description: "Get the status of a Proxmox task by its UPID",
      inputSchema: {
        node: fields.nonEmpty.describe("Node where the task runs"),
        upid: fields.nonEmpty.describe("Task UPID"),
      },
      handler: ({ node, upid }) =>
        read(async () => {
          const status = await backend.pollTask(node, upid);
          if (!status) throw new NotFoundError(`Task ${upid} not found on node ${node}`);
          return status;
        }),
    }),
  ];
}
