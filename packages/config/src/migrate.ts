import { isPlainObject } from '@nanobot-launcher/core';

/**
 * Migrate older config layouts to the current one.
 *
 * - `tools.exec.restrictToWorkspace` moved to `tools.restrictToWorkspace`
 *
 * Input keys are expected in camelCase. Returns a new object.
 */
export function migrateConfig(data: Record<string, unknown>): Record<string, unknown> {
  const tools = data.tools;
  if (!isPlainObject(tools)) return data;

  const exec = tools.exec;
  if (!isPlainObject(exec) || !('restrictToWorkspace' in exec) || 'restrictToWorkspace' in tools) {
    return data;
  }

  const { restrictToWorkspace, ...restExec } = exec;
  return {
    ...data,
    tools: {
      ...tools,
      exec: restExec,
      restrictToWorkspace,
    },
  };
}
