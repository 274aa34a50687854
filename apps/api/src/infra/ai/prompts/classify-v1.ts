export const CLASSIFY_PROMPT = `Please analyze this image and determine which single category it best fits into. Respond ONLY with one of these exact words:
- healthcare
- psychology
- education
- undersea

Choose the most appropriate category based on these criteria:
- healthcare: medical images, clinical photos, anatomical diagrams, health-related content
- psychology: behavioral studies, emotional expressions, psychological tests, therapy settings
- education: learning materials, classroom content, educational diagrams, teaching resources
- undersea: marine life, underwater equipment, oceanic phenomena, submarines, aquatic scenes

Respond with just the category name in lowercase, nothing else.`;
