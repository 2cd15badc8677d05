export function SEARCH_PHRASE_TEMPLATE(description: string): string {
  return `Read the listener's description of the playlist they want and turn it into music recommendations.
Reply with ONLY a short phrase or a few keywords that work well as a music catalog search query. No quotes, no explanation.

DESCRIPTION:
${description}`;
}

export function EXPLAIN_SONG_TEMPLATE(params: {
  phrase: string;
  title: string;
  artist: string;
}): string {
  return `In one sentence, explain why the song '${params.title}' by ${params.artist} fits the prompt '${params.phrase}'. Focus on musical style and genre.`;
}
