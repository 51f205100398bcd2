/**
 * @jest-environment jsdom
 */
import { waitFor } from '@testing-library/react';
import { InputImageStore, isSupportedInputImage } from '../input-image-store';

describe('isSupportedInputImage', () => {
  it('accepts the supported image formats', () => {
    for (const name of ['a.png', 'b.jpg', 'c.JPEG', 'd.gif', 'e.webp']) {
      expect(isSupportedInputImage(new File(['x'], name, { type: 'image/png' }))).toBe(true);
    }
  });

  it('rejects other formats and non-images', () => {
    expect(isSupportedInputImage(new File(['x'], 'scan.bmp', { type: 'image/bmp' }))).toBe(false);
    expect(isSupportedInputImage(new File(['x'], 'notes.png', { type: 'text/plain' }))).toBe(false);
  });
});

describe('InputImageStore', () => {
  beforeEach(() => {
    InputImageStore.Reset();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('stores a picked image with its preview and opens the presets', async () => {
    const file = new File(['hello'], 'cat.png', { type: 'image/png' });

    InputImageStore.OnFileChange(file);

    await waitFor(() => {
      expect(InputImageStore.previewUrl).toBe('data:image/png;base64,aGVsbG8=');
    });
    expect(InputImageStore.file).toBe(file);
    expect(InputImageStore.showPresets).toBe(true);
  });

  it('drops a preview that finishes loading after the image was cleared', async () => {
    const readAsDataURL = FileReader.prototype.readAsDataURL;
    let markLoaded: () => void = () => undefined;
    const loaded = new Promise<void>((resolve) => {
      markLoaded = resolve;
    });
    jest
      .spyOn(FileReader.prototype, 'readAsDataURL')
      .mockImplementation(function (this: FileReader, blob: Blob) {
        this.addEventListener('load', () => markLoaded());
        readAsDataURL.call(this, blob);
      });

    InputImageStore.OnFileChange(new File(['hello'], 'cat.png', { type: 'image/png' }));
    InputImageStore.Reset();
    await loaded;

    expect(InputImageStore.file).toBeNull();
    expect(InputImageStore.previewUrl).toBe('');
    expect(InputImageStore.showPresets).toBe(false);
  });

  it('keeps only the latest pick when two previews are loading', async () => {
    const first = new File(['first'], 'first.png', { type: 'image/png' });
    const second = new File(['hello'], 'second.png', { type: 'image/png' });

    InputImageStore.OnFileChange(first);
    InputImageStore.OnFileChange(second);

    await waitFor(() => {
      expect(InputImageStore.previewUrl).toBe('data:image/png;base64,aGVsbG8=');
    });
    expect(InputImageStore.file).toBe(second);
  });

  it('ignores unsupported files', () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    InputImageStore.OnFileChange(new File(['x'], 'report.pdf', { type: 'application/pdf' }));

    expect(InputImageStore.file).toBeNull();
    expect(InputImageStore.showPresets).toBe(false);
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('ignores an empty selection', () => {
    InputImageStore.OnFileChange(undefined);
    InputImageStore.OnFileChange(null);

    expect(InputImageStore.file).toBeNull();
  });

  it('hides the presets but keeps the image', () => {
    const file = new File(['x'], 'cat.png', { type: 'image/png' });
    InputImageStore.UpdateImage(file, 'data:image/png;base64,eA==');

    InputImageStore.HidePresets();

    expect(InputImageStore.showPresets).toBe(false);
    expect(InputImageStore.file).toBe(file);
    expect(InputImageStore.previewUrl).toBe('data:image/png;base64,eA==');
  });
});
