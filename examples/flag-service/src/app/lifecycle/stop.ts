import type { AppContext } from "../create-context"

export type LifecycleHook = {
  name: string
  fn: () => Promise<void>
}

export function createStopHooks(context: AppContext): LifecycleHook[] {
  return [
    {
      name: "stop:flags:scheduler",
      fn: async () => {
        await context.services.domains.flags.scheduler.stop()
      },
    },
    {
      name: "stop:s3",
      fn: async () => {
        context.infra.s3Client?.destroy()
      },
    },
  ]
}

/** Runs every hook in order; a failing hook is logged and the rest still run. */
export async function runStopHooks(context: AppContext): Promise<void> {
  const logger = context.services.core.logger.child({ module: "lifecycle" })

  for (const hook of createStopHooks(context)) {
    try {
      await hook.fn()
    } catch (err) {
      logger.error("Stop hook failed", { hook: hook.name, err })
    }
  }
}

export type CreateStopHooksFn = typeof createStopHooks
