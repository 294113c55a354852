import OpenAI from 'openai'
import type { ResolvedConfig } from '../config/schema.js'
import { errorMessage } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import { CircuitBreaker, DEFAULT_RETRY_OPTIONS, withRetry } from './retry.js'
import type { ChatMessage, ChatParams, ChatResponse, LLMClient, ToolCall } from './types.js'

function toOpenAIMessage(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content ?? '' }
        case 'user':
            return { role: 'user', content: message.content ?? '' }
        case 'tool':
            return { role: 'tool', content: message.content ?? '', tool_call_id: message.tool_call_id ?? '' }
        case 'assistant':
            return {
                role: 'assistant',
                content: message.content,
                ...(message.tool_calls?.length ? { tool_calls: message.tool_calls } : {}),
            }
    }
}

export function createLLMClient(config: ResolvedConfig, logger: Logger): LLMClient {
    const openai = new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL,
        defaultHeaders: {
            'X-Title': 'strata',
        },
    })

    const breaker = new CircuitBreaker()

    return {
        async chat(params: ChatParams): Promise<ChatResponse> {
            const model = params.model ?? config.model

            const retry = {
                ...DEFAULT_RETRY_OPTIONS,
                signal: params.signal,
                onRetry: (attempt: number, delay: number, error: unknown) =>
                    logger.warn({ model, attempt, delay, error: errorMessage(error) }, 'llm:retry'),
            }

            const result = await breaker.execute(() =>
                withRetry(async () => {
                    const response = await openai.chat.completions.create(
                        {
                            model,
                            messages: params.messages.map(toOpenAIMessage),
                            tools: params.tools?.length ? params.tools : undefined,
                            temperature: params.temperature ?? config.temperature,
                            max_tokens: params.maxTokens ?? config.maxTokens,
                        },
                        { signal: params.signal }
                    )

                    const choice = response.choices[0]
                    if (!choice) throw new Error('No response from LLM')

                    const toolCalls: ToolCall[] = (choice.message.tool_calls ?? []).map((tc) => ({
                        id: tc.id,
                        type: 'function' as const,
                        function: {
                            name: tc.function.name,
                            arguments: tc.function.arguments,
                        },
                    }))

                    let finishReason: ChatResponse['finishReason'] = 'stop'
                    if (choice.finish_reason === 'tool_calls') finishReason = 'tool_calls'
                    else if (choice.finish_reason === 'length') finishReason = 'length'
                    else if (toolCalls.length > 0) finishReason = 'tool_calls'

                    return {
                        content: choice.message.content,
                        toolCalls,
                        finishReason,
                        usage: {
                            promptTokens: response.usage?.prompt_tokens ?? 0,
                            completionTokens: response.usage?.completion_tokens ?? 0,
                        },
                    }
                }, retry)
            )

            logger.debug({ model, usage: result.usage, finishReason: result.finishReason }, 'llm:response')
            return result
        },
    }
}
