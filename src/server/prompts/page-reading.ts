export function extractListingsPrompt(query: string): string {
  return `You are reading a second-hand marketplace search results page for the query "${query}".

Look at the accessibility tree and extract every listing card:
- title: the item title as shown
- price: the asking price as a number (strip currency symbols and commas; "S$1,200" becomes 1200)
- sellerId: the seller's username on the card
- url: the card's link to the listing page

Skip ads, "sponsored" carousels and category shortcuts. Keep page order.`;
}

export function readChatPrompt(): string {
  return `You are reading a marketplace chat between a buyer (us) and a seller.

From the accessibility tree:
1. List the chat bubbles in order. Our messages are "buyer", the other party's are "seller".
2. Ignore system banners, safety tips, offer widgets and timestamps.
3. If this is a listing page with no chat open yet, give the ref of the "Chat" / "Chat with seller" / "Make offer" button as chatButtonRef.`;
}
