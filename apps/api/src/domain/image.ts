export type SupportedImageType = 'image/jpeg' | 'image/png';

/**
 * Identifies PNG and JPEG payloads by their leading bytes.
 * The declared mimetype of an upload is never trusted on its own.
 */
export function sniffImageType(buffer: Uint8Array): SupportedImageType | null {
    // JPEG: FF D8 FF
    if (buffer.length >= 3 && buffer[0] === 0xFF && buffer[1] === 0xD8 && buffer[2] === 0xFF) return 'image/jpeg';
    // PNG: 89 50 4E 47
    if (buffer.length >= 4 && buffer[0] === 0x89 && buffer[1] === 0x50 && buffer[2] === 0x4E && buffer[3] === 0x47) return 'image/png';

    return null;
}

export function extensionFor(filename: string): string {
    const match = /\.([a-z0-9]+)$/i.exec(filename);
    return match ? `.${match[1].toLowerCase()}` : '';
}
