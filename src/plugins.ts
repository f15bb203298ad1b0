import { MacroError } from "./errors";
import type { MacroTable } from "./macro";

const GIST_USAGE = `Gist: invalid arguments
valid examples:
{{ Gist "user/123abcdef" }}
{{ Gist "user/123abcdef" "foo.rb" }}
{{ Gist "123abcdef" }}
{{ Gist "123abcdef" "bar.rb" }}`;

/** Default macros available in markdown files. */
export const plugins: MacroTable = {
  Gist(...args) {
    switch (args.length) {
      case 1:
        return `<script src="https://gist.github.com/${args[0]}.js"></script>`;
      case 2:
        return `<script src="https://gist.github.com/${args[0]}.js?${new URLSearchParams({ file: args[1] })}"></script>`;
      default:
        throw new MacroError("Gist", GIST_USAGE);
    }
  },
};
