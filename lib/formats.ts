import path from "node:path";

const IMAGE_EXTENSIONS = new Set(["jpg", "jpeg", "png", "gif", "bmp"]);

const EXTENDED_IMAGE_EXTENSIONS = new Set([
  "webp",
  "tif",
  "tiff",
  "avif",
  "heic",
  "heif",
  "jxl",
  "jp2",
  "ico",
  "tga",
]);

/**
 * Extension of the last path segment, without the dot, or `undefined` when
 * there is none. Dotfiles (".cover") and a trailing dot ("page.") have none.
 */
export function fileExtension(filePath: string): string | undefined {
  const ext = path.posix.extname(filePath.replace(/\\/g, "/"));
  return ext.length > 1 ? ext.slice(1) : undefined;
}

export function hasImageExtension(filePath: string, acceptExtended: boolean): boolean {
  const ext = fileExtension(filePath)?.toLowerCase();
  if (!ext) return false;
  return IMAGE_EXTENSIONS.has(ext) || (acceptExtended && EXTENDED_IMAGE_EXTENSIONS.has(ext));
}
