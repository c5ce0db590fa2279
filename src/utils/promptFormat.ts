import { type Message, messageText } from '../types/request.js';

/**
 * Template for rendering a conversation into a single prompt string, for
 * vendors that only take raw completions.
 */
export interface PromptFormat {
  begin: string;
  systemPre: string;
  systemPost: string;
  userPre: string;
  userPost: string;
  assistantPre: string;
  assistantPost: string;
  end: string;
  /** Fold system turns into the first user turn instead of emitting them. */
  mergeSystem: boolean;
}

export const GENERIC_PROMPT_FORMAT: PromptFormat = {
  begin: '',
  systemPre: '### System:\n',
  systemPost: '\n\n',
  userPre: '### User:\n',
  userPost: '\n\n',
  assistantPre: '### Assistant:\n',
  assistantPost: '\n\n',
  end: '### Assistant:\n',
  mergeSystem: false,
};

export const LLAMA2_PROMPT_FORMAT: PromptFormat = {
  begin: '',
  systemPre: '',
  systemPost: '',
  userPre: '<s>[INST] ',
  userPost: ' [/INST]',
  assistantPre: ' ',
  assistantPost: ' </s>',
  end: '',
  mergeSystem: true,
};

export const LLAMA3_PROMPT_FORMAT: PromptFormat = {
  begin: '<|begin_of_text|>',
  systemPre: '<|start_header_id|>system<|end_header_id|>\n\n',
  systemPost: '<|eot_id|>',
  userPre: '<|start_header_id|>user<|end_header_id|>\n\n',
  userPost: '<|eot_id|>',
  assistantPre: '<|start_header_id|>assistant<|end_header_id|>\n\n',
  assistantPost: '<|eot_id|>',
  end: '<|start_header_id|>assistant<|end_header_id|>\n\n',
  mergeSystem: false,
};

export function selectPromptFormat(modelName: string): PromptFormat {
  const name = modelName.toLowerCase();
  if (/llama-?3/.test(name)) return LLAMA3_PROMPT_FORMAT;
  if (/llama-?2|mistral|mixtral/.test(name)) return LLAMA2_PROMPT_FORMAT;
  return GENERIC_PROMPT_FORMAT;
}

export function formatPrompt(messages: readonly Message[], format: PromptFormat): string {
  let prompt = format.begin;
  let pendingSystem = '';

  for (const message of messages) {
    const text = messageText(message);
    switch (message.role) {
      case 'system':
        if (format.mergeSystem) {
          pendingSystem += `${text}\n\n`;
        } else {
          prompt += `${format.systemPre}${text}${format.systemPost}`;
        }
        break;
      case 'user':
        prompt += `${format.userPre}${pendingSystem}${text}${format.userPost}`;
        pendingSystem = '';
        break;
      case 'assistant':
        prompt += `${format.assistantPre}${text}${format.assistantPost}`;
        break;
    }
  }

  return prompt + format.end;
}
