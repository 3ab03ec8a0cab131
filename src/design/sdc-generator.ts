/**
 * SDC Generator
 *
 * Emits an SDC constraint file from a YAML description of clocks,
 * IO delays and timing exceptions.
 *
 * Example spec:
 *   clocks:
 *     - { name: core_clk, period: 2.0, waveform: [0, 1.0], port: clk }
 *   io_delays:
 *     inputs:  [{ port: din, max: 0.4, min: 0.1 }]
 *     outputs: [{ port: dout, max: 0.5 }]
 *   exceptions:
 *     false_paths: [{ from: [rst_n], to: [core_reg] }]
 *     multicycle:  [{ setup: 2, hold: 1, from: [a_reg], to: [b_reg] }]
 */

import { load as loadYaml } from "js-yaml";
import { z } from "zod";

const pinList = z.union([z.string().min(1), z.array(z.string().min(1)).nonempty()]);

export const constraintSpecSchema = z.object({
  clocks: z
    .array(
      z.object({
        name: z.string().min(1),
        period: z.number().positive(),
        waveform: z.tuple([z.number(), z.number()]),
        port: z.string().min(1),
      })
    )
    .default([]),
  io_delays: z
    .object({
      inputs: z
        .array(z.object({ port: z.string().min(1), max: z.number(), min: z.number() }))
        .default([]),
      outputs: z.array(z.object({ port: z.string().min(1), max: z.number() })).default([]),
    })
    .default({}),
  exceptions: z
    .object({
      false_paths: z.array(z.object({ from: pinList, to: pinList })).default([]),
      multicycle: z
        .array(
          z.object({
            setup: z.number().int().positive(),
            hold: z.number().int().nonnegative(),
            from: pinList,
            to: pinList,
          })
        )
        .default([]),
    })
    .default({}),
});

export type ConstraintSpec = z.infer<typeof constraintSpecSchema>;

function pins(value: string | string[]): string {
  if (typeof value === "string") return value;
  return value.length === 1 ? value[0] : `{${value.join(" ")}}`;
}

/**
 * Render SDC text; one command per line, newline terminated
 */
export function emitSdc(spec: ConstraintSpec): string {
  const lines: string[] = [];

  for (const clk of spec.clocks) {
    lines.push(
      `create_clock -name ${clk.name} -period ${clk.period} -waveform {${clk.waveform[0]} ${clk.waveform[1]}} [get_ports ${clk.port}]`
    );
  }

  for (const input of spec.io_delays.inputs) {
    lines.push(`set_input_delay -max ${input.max} [get_ports ${input.port}] -clock [get_clocks *]`);
    lines.push(`set_input_delay -min ${input.min} [get_ports ${input.port}] -clock [get_clocks *]`);
  }
  for (const output of spec.io_delays.outputs) {
    lines.push(`set_output_delay -max ${output.max} [get_ports ${output.port}] -clock [get_clocks *]`);
  }

  for (const fp of spec.exceptions.false_paths) {
    lines.push(`set_false_path -from ${pins(fp.from)} -to ${pins(fp.to)}`);
  }
  for (const mc of spec.exceptions.multicycle) {
    lines.push(`set_multicycle_path ${mc.setup} -setup -from ${pins(mc.from)} -to ${pins(mc.to)}`);
    lines.push(`set_multicycle_path ${mc.hold} -hold -from ${pins(mc.from)} -to ${pins(mc.to)}`);
  }

  return `${lines.join("\n")}\n`;
}

/**
 * Parse and validate a YAML constraint spec
 */
export function parseConstraintSpec(yamlText: string): ConstraintSpec {
  const raw: unknown = loadYaml(yamlText);
  const result = constraintSpecSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid constraint spec: ${issues}`);
  }
  return result.data;
}

export function generateSdc(yamlText: string): string {
  return emitSdc(parseConstraintSpec(yamlText));
}
