/**
 * @jest-environment jsdom
 */
import { fireEvent, render, screen, waitFor } from '@testing-library/react';
import MessageContent, { messageText } from '../message-content';

describe('messageText', () => {
  it('joins the text parts', () => {
    expect(
      messageText([
        { type: 'text', text: 'First' },
        { type: 'image_url', image_url: { url: 'data:image/png;base64,eA==' } },
        { type: 'text', text: 'Second' },
      ])
    ).toBe('First\nSecond');
    expect(messageText('Plain')).toBe('Plain');
  });
});

const mockClipboard = (writeText: jest.Mock) => {
  Object.defineProperty(navigator, 'clipboard', {
    value: { writeText },
    configurable: true,
  });
};

describe('MessageContent', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('renders assistant messages as markdown', () => {
    render(
      <MessageContent message={{ role: 'assistant', content: 'This is **important**.' }} />
    );

    expect(screen.getByText('important').tagName).toBe('STRONG');
  });

  it('renders fenced code with a copy button', () => {
    render(
      <MessageContent
        message={{ role: 'assistant', content: '```bash\necho "hi"\n```' }}
      />
    );

    expect(screen.getByText('Copy bash')).toBeInTheDocument();
  });

  it('copies the code of a fenced block', () => {
    const writeText = jest.fn().mockResolvedValue(undefined);
    mockClipboard(writeText);
    render(
      <MessageContent
        message={{ role: 'assistant', content: 'Run this:\n\n```bash\necho "hi"\n```' }}
      />
    );

    fireEvent.click(screen.getByText('Copy bash'));

    expect(writeText).toHaveBeenCalledWith('echo "hi"');
  });

  it('logs a warning when the clipboard refuses the code', async () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    mockClipboard(jest.fn().mockRejectedValue(new Error('denied')));
    render(<MessageContent message={{ role: 'assistant', content: '```bash\nls\n```' }} />);

    fireEvent.click(screen.getByText('Copy bash'));

    await waitFor(() => expect(warnSpy).toHaveBeenCalledTimes(1));
    expect(warnSpy.mock.calls[0][0]).toContain(
      'Failed to copy code to clipboard {"error":"denied"}'
    );
  });

  it('logs a warning when the clipboard refuses the message', async () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    mockClipboard(jest.fn().mockRejectedValue(new Error('denied')));
    render(<MessageContent message={{ role: 'assistant', content: 'Copy me' }} />);

    fireEvent.click(screen.getByRole('button', { name: 'Copy message' }));

    await waitFor(() => expect(warnSpy).toHaveBeenCalledTimes(1));
    expect(warnSpy.mock.calls[0][0]).toContain('Failed to copy to clipboard {"error":"denied"}');
    expect(screen.getByRole('button', { name: 'Copy message' })).toBeInTheDocument();
  });

  it('copies the message text', () => {
    const writeText = jest.fn().mockResolvedValue(undefined);
    mockClipboard(writeText);
    render(<MessageContent message={{ role: 'assistant', content: 'Copy me' }} />);

    fireEvent.click(screen.getByRole('button', { name: 'Copy message' }));

    expect(writeText).toHaveBeenCalledWith('Copy me');
  });

  it('renders user text and images as is', () => {
    render(
      <MessageContent
        message={{
          role: 'user',
          content: [
            { type: 'text', text: 'What is **this**?' },
            { type: 'image_url', image_url: { url: 'data:image/png;base64,eA==' } },
          ],
        }}
      />
    );

    expect(screen.getByText('What is **this**?')).toBeInTheDocument();
    expect(screen.getByRole('img')).toHaveAttribute('src', 'data:image/png;base64,eA==');
  });
});
