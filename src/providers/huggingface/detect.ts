import type { ModelFormat, ModelType } from '../../model/types';

const PIPELINE_TYPES: Record<string, ModelType> = {
  'text-generation': 'llm',
  'text2text-generation': 'llm',
  'image-text-to-text': 'vlm',
  'visual-question-answering': 'vlm',
  'automatic-speech-recognition': 'asr',
  'text-to-speech': 'tts',
  'feature-extraction': 'embedding',
  'sentence-similarity': 'embedding',
  'text-to-image': 'diffusion',
  'image-to-image': 'diffusion',
  'text-to-video': 'video_gen',
  'image-to-video': 'video_gen',
  'object-detection': 'detection',
  'image-segmentation': 'detection',
  'text-ranking': 'rerank',
  reranking: 'rerank',
};

/** Checked in order; the first hint contained in any tag wins. */
const TAG_HINTS: ReadonlyArray<readonly [string, ModelType]> = [
  ['text-generation', 'llm'],
  ['causal-lm', 'llm'],
  ['causal-language-model', 'llm'],
  ['vision-language', 'vlm'],
  ['visual-language', 'vlm'],
  ['vlm', 'vlm'],
  ['speech-recognition', 'asr'],
  ['asr', 'asr'],
  ['speech-synthesis', 'tts'],
  ['tts', 'tts'],
  ['sentence-embeddings', 'embedding'],
  ['embeddings', 'embedding'],
  ['stable-diffusion', 'diffusion'],
  ['diffusion', 'diffusion'],
];

const TYPE_PIPELINE_TAGS: Record<ModelType, string> = {
  llm: 'text-generation',
  vlm: 'image-text-to-text',
  asr: 'automatic-speech-recognition',
  tts: 'text-to-speech',
  embedding: 'feature-extraction',
  diffusion: 'text-to-image',
  video_gen: 'text-to-video',
  detection: 'object-detection',
  rerank: 'text-ranking',
};

export function detectModelType(pipelineTag: string | undefined, tags: readonly string[]): ModelType {
  const byPipeline = pipelineTag ? PIPELINE_TYPES[pipelineTag.toLowerCase()] : undefined;
  if (byPipeline) return byPipeline;
  for (const tag of tags) {
    const lower = tag.toLowerCase();
    for (const [hint, type] of TAG_HINTS) {
      if (lower.includes(hint)) return type;
    }
  }
  return 'llm';
}

export function modelTypeToPipelineTag(type: ModelType): string {
  return TYPE_PIPELINE_TAGS[type];
}

export const WEIGHT_EXTENSIONS = ['.gguf', '.safetensors', '.onnx', '.bin', '.pt', '.pth'] as const;

export function detectFormat(filename: string): ModelFormat | undefined {
  const lower = filename.toLowerCase();
  if (lower.endsWith('.gguf')) return 'gguf';
  if (lower.endsWith('.safetensors')) return 'safetensors';
  if (lower.endsWith('.onnx')) return 'onnx';
  if (lower.endsWith('.engine') || lower.endsWith('.plan') || lower.endsWith('.trt')) {
    return 'tensorrt';
  }
  if (lower.endsWith('.bin') || lower.endsWith('.pt') || lower.endsWith('.pth')) return 'pytorch';
  return undefined;
}

export function isWeightFile(filename: string): boolean {
  const lower = filename.toLowerCase();
  return WEIGHT_EXTENSIONS.some((extension) => lower.endsWith(extension));
}

const QUANTIZED_TAGS = ['quantized', '4bit', '8bit', 'gptq', 'awq', 'gguf'];

export function isQuantized(tags: readonly string[]): boolean {
  return tags.some((tag) => {
    const lower = tag.toLowerCase();
    return QUANTIZED_TAGS.some((marker) => lower.includes(marker));
  });
}
