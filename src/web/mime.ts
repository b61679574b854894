/**
 * Guess a Content-Type from a filename based on extension.
 * Used when serving uploaded lot images and static assets.
 * Defaults to application/octet-stream when unknown.
 */
export function getContentTypeFromName(name: string): string {
  const ext = (name.split(".").pop() || "").toLowerCase();
  switch (ext) {
    case "png":
      return "image/png";
    case "jpg":
    case "jpeg":
      return "image/jpeg";
    case "css":
      return "text/css; charset=utf-8";
    default:
      return "application/octet-stream";
  }
}
