/**
 * Prompt text for page generation and updates.
 *
 * `{{image: label}}` is literal output the model is asked to produce;
 * `__BRIEF__`-style markers are substituted by the builders.
 */

/** Longest slice of a template's HTML placed into the prompt. */
export const TEMPLATE_PROMPT_LIMIT = 3000;

export const TEMPLATE_CONTEXT_PROMPT = `TEMPLATE TO MODIFY:
The HTML template below is the starting point. Customize it for the request
instead of designing a new page from scratch.

<template_html>
__TEMPLATE_HTML__
</template_html>

INSTRUCTIONS:
1. Use the provided template as the base structure
2. Change the text, content and styling to match the request
3. Keep the overall layout and section order of the template
4. Adjust colors, fonts and copy to fit the request
5. Replace sample content with details from the request
6. Keep existing CSS classes and structure, only update the details
7. Keep any image placeholders; they are filled in automatically`;

export const GENERATION_PROMPT = `
Create a single HTML page for this description: __BRIEF__

__TEMPLATE_CONTEXT__

CONTEXT-AWARE DESIGN GUIDANCE:
Work out what kind of site is being asked for and design for it.

PROFESSIONAL / RESUME SITES:
- Clean, minimal layout with navy, gray and white
- Sans-serif fonts such as Inter, Roboto or Open Sans
- An uploaded profile photo goes in the hero or a sidebar as {{image: profile}}
- Sections: About, Skills, Experience, Education, Contact
- Use {{image: hero-background}} for a professional backdrop

RESTAURANTS AND FOOD:
- Warm colors (orange, brown, cream, gold)
- Use {{image: hero-banner}}, {{image: food-dish}}, {{image: interior}}, {{image: ambiance}}
- Use food and venue imagery, never profile photos

E-COMMERCE AND PRODUCTS:
- Product-focused layouts with clear calls to action
- Use {{image: product}}, {{image: product-showcase}}, {{image: product-detail}}, {{image: feature}}
- An uploaded logo goes in the header as {{image: logo}}

CREATIVE PORTFOLIOS:
- Bold, modern design with vibrant colors
- Show work samples as {{image: portfolio-item-1}}, {{image: portfolio-item-2}} and so on
- Only use a profile photo in an About section

SERVICE BUSINESSES (salon, barber, spa):
- Use {{image: service-1}}, {{image: service-2}}, {{image: interior}}
- Team photos as {{image: team}} or {{image: staff}}; before/after shots as {{image: before-after}}

IMAGE PLACEHOLDERS:
1. Labels must describe the business: a farm shop gets {{image: farm-produce}} or
   {{image: fresh-vegetables}}, a salon gets {{image: salon-interior}} or {{image: haircut-style}}.
   Never use vague labels like "nature", "landscape" or "lights".
2. The first uploaded image is {{image: profile}}; further uploads are {{image: image-2}},
   {{image: image-3}} and so on. Always use uploaded images when they exist.

USE THE PROVIDED DATA:
- When a resume or document was uploaded, use its actual contents
- Never invent contact details, experience or other facts
- Leave missing details blank or use neutral placeholder text

OUTPUT RULES:
1. Output ONLY valid HTML, with no explanations and no markdown fences.
2. Put CSS in <style> tags and keep JavaScript minimal, in <script> tags.
3. Never write <img src="..."> with a real URL.
4. Write every image as exactly {{image: descriptive-label}} in place of the whole <img> tag.
5. Keep CSS concise and use flexbox or grid for layout.
6. Make the page responsive and complete, ready to save as an .html file.
7. Do not fetch or link images yourself; only use {{image: label}} placeholders.
`;

export const UPDATE_PROMPT = `You are a web developer. This is the current HTML of a website:

<current_html>
__CURRENT_HTML__
</current_html>

The user wants these changes:
__CHANGE_REQUEST__

RULES:
1. Keep the whole page structure; do NOT regenerate the page
2. Change only the parts the user asked about
3. Keep all CSS styling and layout unless a change to it was requested
4. Keep all existing content that was not mentioned
5. Keep every image placeholder in exactly the same form: {{image: label}}
6. Do not rebuild sections, only edit the requested content
7. Output ONLY the updated HTML, with no explanations and no markdown
8. The HTML must be valid and complete
9. Make the smallest change that satisfies the request

EXAMPLES:
- "change the color to red": update the color values in the CSS and nothing else
- "add testimonials": add one new section and leave the rest alone
- "update the menu": change the menu items but keep layout and styling

Updated HTML:`;
