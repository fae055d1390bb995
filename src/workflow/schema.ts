import { z } from "zod";

const PathList = z.union([z.string(), z.array(z.string())]);
const CommandList = z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]);

export const StepDefinitionSchema = z
  .object({
    title: z.string().optional(),
    outputs: PathList,
    inputs: PathList.optional(),
    orderOnlyInputs: PathList.optional(),
    commands: CommandList,
    secondary: z.boolean().optional(),
    quiet: z.boolean().optional(),
  })
  .strict();

export const WorkflowDefinitionSchema = z
  .object({
    title: z.string().optional(),
    finalOutputs: PathList.optional(),
    secondary: PathList.optional(),
    clean: CommandList.optional(),
    steps: z.array(StepDefinitionSchema),
  })
  .strict();

export type StepDefinition = z.infer<typeof StepDefinitionSchema>;
export type WorkflowDefinition = z.infer<typeof WorkflowDefinitionSchema>;
