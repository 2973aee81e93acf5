export { htmlToBbcode } from "./bbcode.js";
export { htmlToDiscordMarkdown } from "./markdown.js";
