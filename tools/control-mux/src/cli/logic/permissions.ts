import type { CanUseTool } from '../../protocol-types.js';

/**
 * Permission callback that denies the named tools and allows everything else.
 */
export function createDenyListPermission(denyTools: string[]): CanUseTool {
  const denied = new Set(denyTools);
  return async (toolName) => {
    if (denied.has(toolName)) {
      return { behavior: 'deny', message: `Tool ${toolName} is denied by configuration` };
    }
    return { behavior: 'allow' };
  };
}
