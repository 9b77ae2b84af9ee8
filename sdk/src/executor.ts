import { z } from 'zod'
import { ProtocolError, TaskExecutionError } from './errors'
import { decodeJson } from './frames'

// ============================================================================
// Task descriptors
// ============================================================================

export const TaskDescriptorSchema = z.object({
  url: z.string().min(1),
  method: z.string().min(1),
  config: z.record(z.unknown()).default({}),
})

/** `{ url, method, config }`: one unit of remote work. `config` is opaque. */
export type TaskDescriptor = z.infer<typeof TaskDescriptorSchema>

/** Directives an executor may hand back to the listener. */
export interface TaskResult {
  /** Stop listening after the task has been acknowledged. */
  exit?: boolean
  /** Reserved: reload is not supported, the listener only logs it. */
  restart?: boolean
}

export interface TaskExecutor {
  execute(task: TaskDescriptor): TaskResult | void | Promise<TaskResult | void>
}

/** Decode an inbound queue frame into a TaskDescriptor. */
export function decodeTaskDescriptor(frame: string): TaskDescriptor {
  const parsed = TaskDescriptorSchema.safeParse(decodeJson(frame))
  if (!parsed.success) {
    throw new ProtocolError('Message is not a task descriptor', { cause: parsed.error, frame })
  }
  return parsed.data
}

// ============================================================================
// ResourceExecutor
// ============================================================================

export type ResourceHandler = (
  config: Record<string, unknown>,
  task: TaskDescriptor,
) => TaskResult | void | Promise<TaskResult | void>

/**
 * Locates the handler registered for a task's `(url, method)` and invokes it.
 * Methods match case-insensitively.
 */
export class ResourceExecutor implements TaskExecutor {
  private readonly resources = new Map<string, Map<string, ResourceHandler>>()

  register(url: string, method: string, handler: ResourceHandler): this {
    const methods = this.resources.get(url) ?? new Map<string, ResourceHandler>()
    methods.set(method.toLowerCase(), handler)
    this.resources.set(url, methods)
    return this
  }

  has(url: string, method: string): boolean {
    return this.resources.get(url)?.has(method.toLowerCase()) ?? false
  }

  async execute(task: TaskDescriptor): Promise<TaskResult | void> {
    const handler = this.resources.get(task.url)?.get(task.method.toLowerCase())
    if (!handler) {
      throw new TaskExecutionError(`No resource registered for ${task.method} ${task.url}`, {
        url: task.url,
        method: task.method,
      })
    }
    return handler(task.config, task)
  }
}
