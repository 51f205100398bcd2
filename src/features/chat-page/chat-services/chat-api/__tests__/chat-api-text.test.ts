import { ChatApiText } from '../chat-api-text';
import { createChatCompletion } from '../chat-completion';

jest.mock('../chat-completion', () => ({
  createChatCompletion: jest.fn(),
}));

const mockedCompletion = jest.mocked(createChatCompletion);

describe('ChatApiText', () => {
  beforeEach(() => {
    mockedCompletion.mockReset();
  });

  it('appends the user message and the reply to the history', async () => {
    mockedCompletion.mockResolvedValue('Paris.');

    const result = await ChatApiText({
      message: 'And the capital of France?',
      conversationHistory: [
        { role: 'user', content: 'Hi' },
        { role: 'assistant', content: 'Hello! How can I help?' },
      ],
    });

    expect(mockedCompletion).toHaveBeenCalledWith([
      { role: 'user', content: 'Hi' },
      { role: 'assistant', content: 'Hello! How can I help?' },
      { role: 'user', content: 'And the capital of France?' },
    ]);
    expect(result).toEqual({
      status: 'OK',
      response: {
        response: 'Paris.',
        conversation_history: [
          { role: 'user', content: 'Hi' },
          { role: 'assistant', content: 'Hello! How can I help?' },
          { role: 'user', content: 'And the capital of France?' },
          { role: 'assistant', content: 'Paris.' },
        ],
      },
    });
  });

  it('keeps an empty message as a turn', async () => {
    mockedCompletion.mockResolvedValue('Could you say more?');

    const result = await ChatApiText({ message: '', conversationHistory: [] });

    expect(result).toEqual({
      status: 'OK',
      response: {
        response: 'Could you say more?',
        conversation_history: [
          { role: 'user', content: '' },
          { role: 'assistant', content: 'Could you say more?' },
        ],
      },
    });
  });

  it('returns an error when the model call fails', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    mockedCompletion.mockRejectedValue(new Error('Invalid API key'));

    const result = await ChatApiText({ message: 'Hi', conversationHistory: [] });

    expect(result).toEqual({
      status: 'ERROR',
      errors: [{ message: 'Error processing chat: Invalid API key' }],
    });
    expect(errorSpy).toHaveBeenCalledTimes(1);
    errorSpy.mockRestore();
  });
});
