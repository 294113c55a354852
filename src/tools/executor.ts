import { errorMessage } from '../core/errors.js'
import type { Result } from '../core/result.js'
import { err, ok } from '../core/result.js'
import { permit } from '../permissions/arbiter.js'
import type { Tracer } from '../tracing/tracer.js'
import type { ToolRegistry } from './registry.js'
import type { ToolContext } from './types.js'

export class ToolExecutor {
    constructor(
        private registry: ToolRegistry,
        private tracer: Tracer
    ) {}

    async executeSafe(name: string, args: unknown, ctx: ToolContext): Promise<Result<string>> {
        const tool = this.registry.get(name)
        if (!tool) {
            return err(`Tool '${name}' not found`)
        }

        if (!this.registry.isAllowed(ctx.role, name)) {
            return err(`Permission denied: ${ctx.role} may not use '${name}'`)
        }

        if (tool.requiredAccess) {
            const { layer, verb } = tool.requiredAccess
            const decision = permit({
                layer,
                verb,
                role: ctx.role,
                callerId: ctx.caller.agentId,
                ownerId: ctx.caller.agentId,
                callerTaskId: ctx.caller.taskId,
                taskId: ctx.memory.taskId,
            })
            if (!decision.allowed) {
                return err(`Permission denied: ${decision.reason ?? `${name} requires ${verb} on ${layer}`}`)
            }
        }

        const parsed = tool.parameters.safeParse(args)
        if (!parsed.success) {
            return err(`Invalid params for ${name}: ${parsed.error.message}`)
        }

        const span = this.tracer.startSpan('tool', name, { parent: ctx.span, taskId: ctx.memory.taskId })

        try {
            const result = await tool.execute(parsed.data, ctx)
            this.tracer.endSpan(span)
            return ok(typeof result === 'string' ? result : JSON.stringify(result))
        } catch (error) {
            this.tracer.endSpan(span, 'error')
            return err(`Tool '${name}' failed: ${errorMessage(error)}`)
        }
    }
}
