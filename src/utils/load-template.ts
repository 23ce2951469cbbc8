import Handlebars from "handlebars";
import { readFile } from "fs/promises";

// Quote a scalar for YAML front matter (JSON strings are valid YAML)
Handlebars.registerHelper("yaml", (value: unknown) =>
  JSON.stringify(value === undefined || value === null ? "" : String(value)),
);

/**
 * Load and compile a template from file path or use default
 * Throws error if custom template fails to load or parse
 */
export async function loadTemplate(
  templatePath: string | null,
  defaultTemplate: string,
): Promise<HandlebarsTemplateDelegate> {
  if (templatePath === null) {
    return Handlebars.compile(defaultTemplate);
  }

  const templateContent = await readFile(templatePath, "utf-8");
  // compile() defers parsing to the first render
  Handlebars.parse(templateContent);
  return Handlebars.compile(templateContent);
}
