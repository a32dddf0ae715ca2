import { TemplateError } from "@conduit/llm-orchestrator";
import type { RenderableTemplate, TemplateInfo } from "./template.js";

/**
 * Templates by name and version. Without a version, `get` returns the one
 * registered last under that name.
 */
export class TemplateRegistry {
  private readonly byName = new Map<string, RenderableTemplate[]>();

  constructor(templates: RenderableTemplate[] = []) {
    for (const template of templates) this.register(template);
  }

  register(template: RenderableTemplate): void {
    const versions = this.byName.get(template.name) ?? [];
    if (versions.some((t) => t.version === template.version)) {
      throw new TemplateError(`Template "${template.id}" is already registered`);
    }
    versions.push(template);
    this.byName.set(template.name, versions);
  }

  has(name: string, version?: string): boolean {
    return this.find(name, version) !== undefined;
  }

  get(name: string, version?: string): RenderableTemplate {
    const template = this.find(name, version);
    if (!template) {
      throw new TemplateError(
        version === undefined ? `Template not found: ${name}` : `Template not found: ${name}@${version}`
      );
    }
    return template;
  }

  list(): TemplateInfo[] {
    return [...this.byName.values()].flatMap((versions) => versions.map((t) => t.info()));
  }

  private find(name: string, version?: string): RenderableTemplate | undefined {
    const versions = this.byName.get(name);
    if (!versions) return undefined;
    return version === undefined ? versions[versions.length - 1] : versions.find((t) => t.version === version);
  }
}
