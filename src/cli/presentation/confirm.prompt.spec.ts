import { PassThrough } from 'node:stream';
import { ConfirmationUnavailableError, ConfirmPrompt, isAffirmative } from './confirm.prompt';

describe('isAffirmative', () => {
  it.each(['y', 'Y', 'yes', ' YES '])('should accept %p', (answer) => {
    expect(isAffirmative(answer)).toBe(true);
  });

  it.each(['', 'n', 'no', 'yep', 'sure'])('should treat %p as no', (answer) => {
    expect(isAffirmative(answer)).toBe(false);
  });
});

describe('ConfirmPrompt', () => {
  let prompt: ConfirmPrompt;
  let input: PassThrough;
  let output: PassThrough;

  beforeEach(() => {
    prompt = new ConfirmPrompt();
    input = new PassThrough();
    output = new PassThrough();
  });

  it('should resolve true for a yes answer', async () => {
    const answer = prompt.confirm('Confirm order placement?', { input, output });
    input.write('y\n');

    await expect(answer).resolves.toBe(true);
  });

  it('should resolve false for any other answer', async () => {
    const answer = prompt.confirm('Confirm order placement?', { input, output });
    input.write('\n');

    await expect(answer).resolves.toBe(false);
  });

  it('should ask the question with a [y/N] suffix', async () => {
    const answer = prompt.confirm('Cancel order 1 on BTCUSDT?', { input, output });
    input.write('n\n');
    await answer;

    expect(String(output.read())).toBe('Cancel order 1 on BTCUSDT? [y/N]: ');
  });

  it('should reject when input has already ended', async () => {
    input.end();

    await expect(prompt.confirm('Confirm order placement?', { input, output })).rejects.toBeInstanceOf(
      ConfirmationUnavailableError,
    );
  });

  it('should reject when input ends while waiting for an answer', async () => {
    const answer = prompt.confirm('Confirm order placement?', { input, output });
    input.end();

    await expect(answer).rejects.toBeInstanceOf(ConfirmationUnavailableError);
  });
});
