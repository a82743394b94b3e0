export const labels = {
  VIEW_ALBUM: "View album",
  MORE_FROM: "More from",
  COPY_LINK: "Copy link",
  addedToPlaylist(count: number, playlistName: string): string {
    return count === 1 ? `Added 1 track to ${playlistName}` : `Added ${count} tracks to ${playlistName}`;
  }
};

const MARKUP_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;"
};

export function escapeMarkup(text: string): string {
  return text.replace(/[&<>"']/g, (char) => MARKUP_ESCAPES[char] ?? char);
}
