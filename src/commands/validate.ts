import path from "node:path";
import { createRegistry } from "../schema/registry.js";
import { PlannerError, errorMessage } from "../errors.js";
import { resolveProject } from "../project/resolver.js";
import { resolveProjectDefaults } from "../project/defaults.js";
import { enumerateVariants } from "../matrix/compatibility.js";
import { diag, type Diagnostic } from "./diagnostics.js";
import { loadCommandConfig, type ConfigOptions } from "./context.js";
import { listProjects, selectProjects } from "./select.js";

export type ValidateResult = { ok: true; checked: string[]; warnings: Diagnostic[] } | { ok: false; errors: Diagnostic[] };

/**
 * Check planner config and project descriptors. With no project arguments
 * every project under the projects directory is checked.
 */
export async function validateProjects(opts: ConfigOptions & { projects?: string[] }): Promise<ValidateResult> {
  const loaded = loadCommandConfig(opts);
  if (!loaded.ok) return { ok: false, errors: [diag("error", loaded.error.code, loaded.error.message)] };
  const { config } = loaded;

  const names =
    opts.projects && opts.projects.length > 0
      ? selectProjects(config.projects_dir, opts.projects)
      : listProjects(config.projects_dir);
  if (names.length === 0) {
    return {
      ok: false,
      errors: [diag("error", "NO_PROJECTS", `No projects found in ${config.projects_dir}`, { path: config.projects_dir })],
    };
  }

  const registry = createRegistry();
  const validate = registry.descriptorValidator("project");
  const defaults = resolveProjectDefaults(config.project_defaults);
  const errors: Diagnostic[] = [];
  const warnings: Diagnostic[] = [];

  for (const name of names) {
    const descriptorPath = path.join(config.projects_dir, name, "project.yaml");
    try {
      const project = resolveProject(name, {
        projectsDir: config.projects_dir,
        imageProject: config.image_project,
        defaults,
        validate,
      });
      if (!project.disabled && enumerateVariants(project).length === 0) {
        warnings.push(
          diag("warn", "NO_SUPPORTED_VARIANTS", `Project "${name}" has no supported engine/sanitizer/architecture combination`, {
            path: descriptorPath,
          }),
        );
      }
    } catch (e) {
      const code = e instanceof PlannerError ? e.code : "PROJECT_READ_FAILED";
      errors.push(diag("error", code, errorMessage(e), { path: descriptorPath }));
    }
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, checked: names, warnings };
}
