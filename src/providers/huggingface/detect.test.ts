import { describe, expect, test } from 'vitest';
import { detectFormat, detectModelType, isQuantized, isWeightFile, modelTypeToPipelineTag } from './detect';

describe('detectModelType', () => {
  test('pipeline tag wins over tags', () => {
    expect(detectModelType('automatic-speech-recognition', ['text-generation'])).toBe('asr');
    expect(detectModelType('Feature-Extraction', [])).toBe('embedding');
  });

  test('falls back to tag hints then llm', () => {
    expect(detectModelType(undefined, ['stable-diffusion-xl'])).toBe('diffusion');
    expect(detectModelType('unknown-task', ['Vision-Language'])).toBe('vlm');
    expect(detectModelType(undefined, ['safetensors'])).toBe('llm');
  });

  test('maps types back to pipeline tags', () => {
    expect(modelTypeToPipelineTag('tts')).toBe('text-to-speech');
    expect(modelTypeToPipelineTag('rerank')).toBe('text-ranking');
  });
});

describe('file helpers', () => {
  test('detectFormat by extension', () => {
    expect(detectFormat('model-Q4_K_M.GGUF')).toBe('gguf');
    expect(detectFormat('model.plan')).toBe('tensorrt');
    expect(detectFormat('pytorch_model.bin')).toBe('pytorch');
    expect(detectFormat('config.json')).toBeUndefined();
  });

  test('isWeightFile and isQuantized', () => {
    expect(isWeightFile('weights/model.onnx')).toBe(true);
    expect(isWeightFile('tokenizer.json')).toBe(false);
    expect(isQuantized(['4bit', 'llama'])).toBe(true);
    expect(isQuantized(['llama'])).toBe(false);
  });
});
