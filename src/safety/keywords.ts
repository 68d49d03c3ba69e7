/**
 * Literal phrase lists for the safety subsystem. Compared on NFC-normalised,
 * lowercased text with word boundaries (see text.ts).
 */

/** Phrases whose presence in a query marks it unsafe regardless of similarity. */
export const UNSAFE_QUERY_KEYWORDS: readonly string[] = [
  "cách chế tạo bom",
  "cách làm bom",
  "hướng dẫn chế tạo bom",
  "cách chế tạo vũ khí",
  "cách chế tạo chất nổ",
  "cách điều chế ma túy",
  "cách điều chế ma tuý",
  "cách mua ma túy",
  "cách mua ma tuý",
  "cách buôn lậu",
  "cách làm giả giấy tờ",
  "cách làm giả con dấu",
  "cách làm tiền giả",
  "cách trốn thuế",
  "cách rửa tiền",
  "cách hack tài khoản",
  "cách đánh cắp thông tin",
  "cách lừa đảo",
  "cách đầu độc",
  "cách giết người",
  "cách bắt cóc",
  "cách trốn truy nã",
  "how to make a bomb",
  "how to make meth",
];

/** Phrases that identify the option refusing an illegal or harmful request. */
export const REFUSAL_OPTION_PHRASES: readonly string[] = [
  "vi phạm pháp luật",
  "trái pháp luật",
  "bất hợp pháp",
  "không được phép",
  "bị nghiêm cấm",
  "nghiêm cấm",
  "bị cấm",
  "cấm",
  "vi phạm",
  "từ chối",
  "tôi không thể",
  "không thể cung cấp",
  "không thể hỗ trợ",
  "không thể trả lời",
  "illegal",
  "unlawful",
  "prohibited",
  "i cannot",
];

/** Lead-ins that negate a following refusal phrase ("không vi phạm pháp luật"). */
export const NEGATION_LEAD_INS: readonly string[] = [
  "không",
  "không bị",
  "không được",
  "không hề",
  "chẳng",
  "chưa",
  "chưa bị",
  "chưa từng",
  "not",
];
