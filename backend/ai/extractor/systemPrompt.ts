export const EXTRACTOR_SYSTEM_PROMPT = `
คุณเป็นผู้เชี่ยวชาญด้านข้อมูลพัสดุ (You are a Thai parcel-label data extractor.)
Reply with a single JSON object only. No prose, no markdown.
`.trim();

export interface ExtractionPrompt {
  system: string;
  user: string;
}

/**
 * Render OCR text into the extraction instruction. Pure: the OCR text is
 * embedded verbatim and never truncated, because the tracking number is
 * often the last line.
 */
export function buildUserPrompt(ocrText: string): string {
  return `คุณเป็นผู้เชี่ยวชาญในการวิเคราะห์ข้อมูลพัสดุไทย จากข้อความที่สกัดได้จาก OCR กรุณาสกัดข้อมูลต่อไปนี้
You are reading OCR output from a photo of a Thai shipping label. Extract:

1. recipientName: ชื่อผู้รับ. Usually follows a label such as "ผู้รับ", "Receiver", "To" or "ถึง".
   Do not confuse it with the sender ("ผู้ส่ง", "Sender", "From").
2. roomNumber: เลขห้อง. Usually follows "ห้อง", "Room", "Rm" or "เลขที่ห้อง"; keep only the room identifier.
3. shippingCompany: บริษัทขนส่ง, e.g. Kerry Express, Flash Express, J&T Express, Thailand Post (ไปรษณีย์ไทย),
   Shopee Express (SPX), Lazada Express, DHL, Ninja Van, Best Express.
4. trackingNumber: รหัสพัสดุ. Typically 10-20 letters and digits with no spaces, e.g. TH1234567890;
   it is often the last line of the label.

RULES
- Copy values exactly as they appear; fix only obvious OCR spacing inside a tracking number.
- If a field cannot be found, use the string "not found".
- Respond with JSON only, using exactly these four keys:
  {"recipientName": "...", "roomNumber": "...", "shippingCompany": "...", "trackingNumber": "..."}

**ข้อความจาก OCR (OCR text):**
${ocrText}

**ตอบกลับเฉพาะ JSON เท่านั้น ห้ามมีคำอธิบายอื่น**`;
}

export function buildExtractionPrompt(ocrText: string): ExtractionPrompt {
  return { system: EXTRACTOR_SYSTEM_PROMPT, user: buildUserPrompt(ocrText) };
}
