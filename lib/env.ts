export const env = {
  debugParser: process.env.BIBLE_PARSER_DEBUG === "true"
};
