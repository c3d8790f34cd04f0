import { clipText } from '../../utils/textNormalizer';

export const INTERRUPTED_MARKER = '[response interrupted]';

export const systemPrompt = () => `You are an assistant for business expense documents: receipts, invoices, travel bookings and expense reports.

Rules:
- Answer from the documents and messages in this conversation. If a figure is not in them, say so instead of guessing.
- Quote amounts with their currency exactly as written, and name the document they come from.
- When asked for totals, list the items you added up.
- Point out missing receipts, duplicate charges, mismatched dates or totals that do not add up.
- Keep answers short; use bullet points for lists of items.`;

/** Content of the user message that records an uploaded document. */
export const documentMessage = (fileName: string, text: string) =>
    `Uploaded document "${fileName}".\n\nDocument Content:\n${clipText(text)}`;

export const interruptedReply = (partialText: string) => `${partialText}\n\n${INTERRUPTED_MARKER}`;
