import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { z } from "zod";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { createServer } from "./server.js";

const textContent = z.array(z.object({ type: z.literal("text"), text: z.string() })).nonempty();

function firstText(content: unknown): unknown {
  return JSON.parse(textContent.parse(content)[0].text);
}

let dir: string;
let client: Client;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "cts-tuner-server-"));
  const server = createServer({ verbose: false, extraHoldPatterns: [], outputDir: dir });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  client = new Client({ name: "cts-tuner-test", version: "1.0.0" });
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
});

afterEach(async () => {
  await client.close();
  await rm(dir, { recursive: true, force: true });
});

describe("MCP server", () => {
  it("lists the tuning and report tools", async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual([
      "suggest_cts_tuning",
      "parse_sta_report",
      "suggest_ecos",
      "diff_netlists",
      "check_liberty",
      "generate_sdc",
      "probe_spef",
    ]);
  });

  it("returns the tuning report as JSON text", async () => {
    const result = await client.callTool({
      name: "suggest_cts_tuning",
      arguments: { log_text: "WNS: -0.120  TNS: -57.000", has_hold: true },
    });

    expect(firstText(result.content)).toMatchObject({
      success: true,
      out_path: null,
      report: {
        summary: { wns: -0.12, tns: -57, hold_issues: true },
        recommendations: [{ domain: "default", recommended_insertion_delay_ns: 1.377 }],
      },
    });
  });

  it("rejects unknown tools", async () => {
    await expect(client.callTool({ name: "run_openlane", arguments: {} })).rejects.toThrow(
      /Tool not found: run_openlane/
    );
  });

  it("rejects invalid arguments", async () => {
    await expect(
      client.callTool({ name: "suggest_cts_tuning", arguments: { wns: "fast" } })
    ).rejects.toThrow(/Invalid arguments for 'suggest_cts_tuning'/);
  });

  it("reports file errors as tool execution failures", async () => {
    await expect(
      client.callTool({ name: "parse_sta_report", arguments: { report_path: join(dir, "missing.rpt") } })
    ).rejects.toThrow(/Tool execution failed/);
  });
});
