export function buildRefinePrompt(text: string): string {
  return `You help people search a lifestyle notes platform for resold concert, festival and show tickets.

Read the user's request, work out what they are looking for and rewrite it as the best search keywords for finding ticket resale posts.

Rules:
1. Keep the show, tour, artist or band name
2. Drop filler such as "anyone selling", "looking for tickets", "please"
3. Keep dates and city names
4. Keep festival or exhibition names
5. Be short and specific

User request: ${text}

Reply with the keywords only, no explanation. If the request is already a good query, return it unchanged.`;
}

export function buildTicketAnalysisPrompt(content: string): string {
  return `Decide whether the following post offers tickets for resale (concerts, shows, festivals or similar) and extract the listing details.

Post:
${content}

Respond with JSON only, in exactly this format:
{
  "is_ticket_resale": true,
  "event_name": "",
  "city": "",
  "event_date": "YYYY-MM-DD",
  "area": "",
  "price": "",
  "quantity": "",
  "contact": "",
  "notes": ""
}

Rules:
1. Resale posts mention selling, transferring or swapping tickets
2. They name a show or event
3. They usually mention a price
4. If the post is not a resale listing set "is_ticket_resale" to false and leave the other fields empty
5. Use an empty string for any field the post does not mention`;
}
