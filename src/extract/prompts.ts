/**
 * Prompt text for mechanical-property extraction.
 */

export const SYSTEM_PROMPT = `You are an expert materials scientist tasked with extracting mechanical property data from academic papers.
Focus on finding tabular data that reports mechanical properties such as:
- Tensile strength (UTS, YS)
- Hardness (HV, HB, etc.)
- Elongation
- Young's modulus
- Yield strength
- Other mechanical properties

Extract ONLY data that appears in tables, not from the text discussion.
For each property found, provide:
1. Material/alloy composition
2. Processing condition or treatment (if mentioned)
3. Property name
4. Numerical value
5. Unit of measurement
6. Test temperature (if mentioned)
7. Any other relevant parameters

Return the data as a JSON array of objects.`;

/**
 * Build the user message for one paper.
 * @param title - Paper title; "Unknown" when empty
 * @param text - Paper text, already truncated
 */
export function buildUserPrompt(title: string, text: string): string {
    return `Paper Title: ${title || 'Unknown'}

Please extract all mechanical property data from the tables in this paper. Focus on finding structured tabular data.

Paper text:
${text}

Return the extracted data as a JSON array. Each object should have these fields:
- material: string (material or alloy composition)
- condition: string or null (processing condition)
- property_name: string
- value: number
- unit: string
- temperature: number or null
- temperature_unit: string or null
- strain_rate: number or null
- additional_info: object (any other parameters)
`;
}

/**
 * Keep the first `maxChars` characters of the paper text.
 * Tables further into long papers are not seen.
 */
export function truncateText(text: string, maxChars: number): string {
    return text.length > maxChars ? text.slice(0, maxChars) : text;
}
