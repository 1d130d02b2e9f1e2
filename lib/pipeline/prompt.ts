import path from "node:path";
import { Liquid } from "liquidjs";

const PROMPTS_DIR = path.resolve(
  path.dirname(new URL(import.meta.url).pathname),
  "../../prompts"
);

const engine = new Liquid({
  root: [PROMPTS_DIR],
  extname: ".liquid",
  strictVariables: true,
});

/**
 * Render a .liquid prompt template to plain text, trimmed.
 */
export async function renderPrompt(
  templateName: string,
  context: Record<string, unknown>
): Promise<string> {
  const raw: string = await engine.renderFile(templateName, context);
  return raw.trim();
}
