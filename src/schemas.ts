import { z } from "zod";

export const SummaryOutputSchema = z.object({
  summary: z
    .string()
    .describe("Dense prose summary of the turns, keeping decisions, breakthroughs, blockers and action items"),
  kind: z
    .enum(["work", "social", "technical"])
    .describe("Dominant character of the conversation"),
});

export type SummaryOutput = z.infer<typeof SummaryOutputSchema>;

export const CrystalOutputSchema = z.object({
  fieldState: z
    .string()
    .describe("Where things stand right now: mood, setting, what is in motion"),
  keyEvents: z
    .array(z.string())
    .describe("What happened, one short line each, in order"),
  decisions: z
    .array(z.string())
    .describe("Decisions made or commitments given"),
  internalArc: z
    .string()
    .describe("How the agent's understanding or feeling moved across the span"),
  continuitySeeds: z
    .array(z.string())
    .describe("Open threads the next session should pick up"),
});

export type CrystalOutput = z.infer<typeof CrystalOutputSchema>;
