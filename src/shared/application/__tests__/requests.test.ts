import { buildPromptRequest, buildVisionRequest, isSupportedImagePath, VISION_INSTRUCTION } from '../requests';
import { InvalidInputError } from '../../domain/errors';
import { NO_MODELS_PLACEHOLDER } from '../../infrastructure/ollama/ModelCatalog';

describe('buildPromptRequest', () => {
  it('builds a frozen request with the system prompt when given', () => {
    const request = buildPromptRequest({ model: 'llama3', question: 'Hello?', systemPrompt: 'Be terse.' });
    expect(request).toEqual({ model: 'llama3', message: 'Hello?', systemPrompt: 'Be terse.' });
    expect(Object.isFrozen(request)).toBe(true);
  });

  it('drops an empty system prompt', () => {
    expect(buildPromptRequest({ model: 'llama3', question: 'Hello?', systemPrompt: '' }).systemPrompt).toBeUndefined();
  });

  it.each([
    [{ model: 'llama3', question: '' }],
    [{ model: 'llama3', question: '   \n' }],
    [{ question: 'Hello?' }],
    [{ model: '', question: 'Hello?' }],
    [{ model: NO_MODELS_PLACEHOLDER, question: 'Hello?' }]
  ])('rejects %j', input => {
    expect(() => buildPromptRequest(input)).toThrow(new InvalidInputError('Please select a model and enter a question.'));
  });

  it('lists the failing fields', () => {
    try {
      buildPromptRequest({ model: 'llama3', question: '' });
      throw new Error('expected a validation error');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError);
      if (!(error instanceof InvalidInputError)) return;
      expect(error.issues).toHaveLength(1);
      expect(error.issues[0].startsWith('question:')).toBe(true);
    }
  });
});

describe('buildVisionRequest', () => {
  const image = { kind: 'path' as const, path: 'cat.jpg' };

  it('sends the fixed instruction with the image', () => {
    expect(buildVisionRequest({ model: 'llava', image })).toEqual({
      model: 'llava',
      message: VISION_INSTRUCTION,
      images: [image]
    });
    expect(VISION_INSTRUCTION).toBe('Extract text from this image:');
  });

  it('asks for an image first', () => {
    expect(() => buildVisionRequest({ model: 'llava' })).toThrow('Please drop or paste an image first.');
  });

  it('asks for a model', () => {
    expect(() => buildVisionRequest({ image })).toThrow('Please select a model.');
    expect(() => buildVisionRequest({ image, model: NO_MODELS_PLACEHOLDER })).toThrow('Please select a model.');
  });
});

describe('isSupportedImagePath', () => {
  it.each(['a.png', 'b.JPG', '/tmp/c.jpeg', 'd.gif', 'e.BMP'])('accepts %s', p => {
    expect(isSupportedImagePath(p)).toBe(true);
  });

  it.each(['notes.txt', 'image.webp', 'png'])('rejects %s', p => {
    expect(isSupportedImagePath(p)).toBe(false);
  });
});
