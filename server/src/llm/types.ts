export type Message = {
    role: "system" | "user" | "assistant";
    content: string;
};

export interface CompletionOptions {
    model?: string;
    temperature?: number;
    timeout?: number;
}

export interface LLMProvider {
    complete(messages: Message[], opts?: CompletionOptions): Promise<string>;
}
