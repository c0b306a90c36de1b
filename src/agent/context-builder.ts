/**
 * Context Builder - system prompt with skill injection
 *
 * Two phases: while no skill is loaded the prompt lists every available skill
 * by name and description; once the model has called `use_skill`, the full
 * content of each loaded skill replaces the summary.
 */

import type { ContextBuilder } from "./types.js";
import { USE_SKILL_TOOL } from "./orchestrator.js";

export interface SkillEntry {
  name: string;
  description: string;
  /** Full instructions, injected once the skill is loaded. */
  content: string;
}

const SECTION_SEPARATOR = "\n\n---\n\n";

export class SkillContextBuilder implements ContextBuilder {
  private readonly basePrompt: string;
  private readonly skills: Map<string, SkillEntry>;

  constructor(params: { basePrompt: string; skills?: SkillEntry[] }) {
    this.basePrompt = params.basePrompt.trim();
    this.skills = new Map((params.skills ?? []).map((skill) => [skill.name, skill]));
  }

  buildSystemPrompt(params: { loadedSkills: readonly string[] }): string {
    const sections: string[] = [];

    if (this.basePrompt) {
      sections.push(this.basePrompt);
    }

    if (params.loadedSkills.length > 0) {
      sections.push(this.buildSelectedSkills(params.loadedSkills));
    } else if (this.skills.size > 0) {
      sections.push(this.buildSkillsSummary());
    }

    return sections.filter(Boolean).join(SECTION_SEPARATOR);
  }

  listSkills(): SkillEntry[] {
    return Array.from(this.skills.values());
  }

  /**
   * Build available skills section
   */
  private buildSkillsSummary(): string {
    const entries = this.listSkills()
      .map((skill) => `- **${skill.name}**: ${skill.description}`)
      .join("\n");

    return `# Available Skills (${this.skills.size})

Call the \`${USE_SKILL_TOOL}\` tool with \`skill_name\` to load a skill's full instructions.

${entries}`;
  }

  /**
   * Build loaded skills section; unknown names are skipped
   */
  private buildSelectedSkills(names: readonly string[]): string {
    const bodies = names
      .map((name) => this.skills.get(name))
      .filter((skill): skill is SkillEntry => skill !== undefined)
      .map((skill) => `## ${skill.name}\n\n${skill.content.trim()}`);

    if (bodies.length === 0) return "";
    return `# Loaded Skills\n\n${bodies.join("\n\n")}`;
  }
}
