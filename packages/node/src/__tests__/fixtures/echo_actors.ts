import { defineActor, stringCodec } from "@trellis-ui/core";

export const shout = defineActor<string, string>({
  name: "shout",
  reach: "private",
  input: stringCodec,
  output: stringCodec,
  create: (link) => ({
    handleInput(input, id) {
      link.respond(id, `${input.toUpperCase()}!`);
    },
  }),
});
