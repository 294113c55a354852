import { estimateTokens, isWithinBudget } from './token-counter.js'

interface PromptSection {
    label: string
    content: string
    priority: number // higher = more important
    pinned: boolean
}

export interface PromptManifest {
    sections: { label: string; tokens: number; included: boolean }[]
    totalTokens: number
    budget: { target: number; hardCap: number }
    overTarget: boolean
}

export interface AddOptions {
    priority?: number
    /** Pinned sections are kept even when they alone exceed the hard cap. */
    pinned?: boolean
}

/** Assembles labelled sections under a token budget, dropping the lowest priority first. */
export class PromptBuilder {
    private sections: PromptSection[] = []

    add(label: string, content: string, options: AddOptions = {}): this {
        this.sections.push({ label, content, priority: options.priority ?? 50, pinned: options.pinned ?? false })
        return this
    }

    build(budget: { target: number; hardCap: number }): string {
        return this.buildWithManifest(budget).prompt
    }

    buildWithManifest(budget: { target: number; hardCap: number }): { prompt: string; manifest: PromptManifest } {
        const sectionTokens = new Map(this.sections.map((s) => [s, estimateTokens(s.content)]))
        const tokensOf = (s: PromptSection) => sectionTokens.get(s) ?? 0

        const included = new Set<PromptSection>()
        let totalTokens = 0
        for (const section of this.sections.filter((s) => s.pinned)) {
            included.add(section)
            totalTokens += tokensOf(section)
        }

        const optional = this.sections.filter((s) => !s.pinned).sort((a, b) => b.priority - a.priority)
        for (const section of optional) {
            if (isWithinBudget(totalTokens + tokensOf(section), budget).withinHardCap) {
                included.add(section)
                totalTokens += tokensOf(section)
            }
        }

        // sections keep insertion order
        const prompt = this.sections
            .filter((s) => included.has(s))
            .map((s) => `## ${s.label}\n\n${s.content}`)
            .join('\n\n')

        return {
            prompt,
            manifest: {
                sections: this.sections.map((s) => ({ label: s.label, tokens: tokensOf(s), included: included.has(s) })),
                totalTokens,
                budget,
                overTarget: !isWithinBudget(totalTokens, budget).withinTarget,
            },
        }
    }
}
