import { performance } from 'node:perf_hooks';
import type {
  CompletionResponse,
  PostProcessingOption,
  PostProcessingResult,
} from '../router/types.js';
import { VALIDATION_FAILURE_MESSAGE, errorMessage } from '../router/errors.js';

const SUMMARY_LIMIT = 500;

function formatContent(content: string, parameters: Record<string, string>): string {
  switch ((parameters['formatType'] ?? 'default').toLowerCase()) {
    case 'json':
      try {
        return JSON.stringify(JSON.parse(content), null, 2);
      } catch {
        // Not JSON: leave the content as the provider returned it.
        return content;
      }
    case 'markdown':
      return content.replace(/\n/g, '\n\n').trim();
    case 'code':
      return `\`\`\`${parameters['language'] ?? 'text'}\n${content}\n\`\`\``;
    default:
      return content;
  }
}

function isValidJson(content: string): boolean {
  try {
    JSON.parse(content);
    return true;
  } catch {
    return false;
  }
}

const CODE_MARKERS: Record<string, string[]> = {
  java: ['import', 'class', 'public'],
  javascript: ['function', 'const', 'let'],
  python: ['def', 'import', 'class'],
  typescript: ['function', 'const', 'let'],
};

function looksLikeCode(content: string, language: string): boolean {
  const markers = CODE_MARKERS[language];
  if (!markers) return true;
  return markers.some(marker => content.includes(marker));
}

export function validateContent(content: string, parameters: Record<string, string>): boolean {
  switch ((parameters['validationType'] ?? 'basic').toLowerCase()) {
    case 'json':
      return isValidJson(content);
    case 'code':
      return looksLikeCode(content, (parameters['language'] ?? 'typescript').toLowerCase());
    default:
      return true;
  }
}

function enhanceContent(content: string, parameters: Record<string, string>): string {
  switch ((parameters['enhancementType'] ?? 'none').toLowerCase()) {
    case 'summarize':
      return content.length > SUMMARY_LIMIT ? `${content.slice(0, SUMMARY_LIMIT)}...` : content;
    case 'expand':
    case 'enhancement':
      return `${content}\n\nAdditional Details`;
    default:
      return content;
  }
}

function applyOption(response: CompletionResponse, option: PostProcessingOption): CompletionResponse {
  const start = performance.now();
  const result: PostProcessingResult = { type: option.type, success: true, processingTimeMs: 0 };
  let next = response;

  try {
    switch (option.type) {
      case 'formatting':
        next = { ...next, content: formatContent(next.content, option.parameters) };
        break;
      case 'validation':
        if (!validateContent(next.content, option.parameters)) {
          next = { ...next, success: false, errorMessage: VALIDATION_FAILURE_MESSAGE };
          result.success = false;
          result.errorMessage = VALIDATION_FAILURE_MESSAGE;
        }
        break;
      case 'enhancement':
        next = { ...next, content: enhanceContent(next.content, option.parameters) };
        break;
    }
  } catch (err) {
    result.success = false;
    result.errorMessage = errorMessage(err);
  }

  result.processingTimeMs = Math.round(performance.now() - start);
  return { ...next, postProcessingResults: [...next.postProcessingResults, result] };
}

/**
 * Runs the request's post-processing options in order. A rejected validation
 * marks the response failed but does not stop later options.
 */
export function applyPostProcessing(
  response: CompletionResponse,
  options: PostProcessingOption[],
): CompletionResponse {
  return options.reduce(applyOption, response);
}
