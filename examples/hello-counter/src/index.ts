import {
  VERTICAL,
  button,
  isToolkitEvent,
  mapState,
  par,
  seq,
  textLabel,
} from "@loom-ui/core";
import { nodeTopFrame } from "@loom-ui/node";

const INC = 1;
const DEC = 2;

await nodeTopFrame(
  { title: "Hello Counter", width: 240, height: 120, orientation: VERTICAL },
  seq(
    par(button("+1", INC), button("-1", DEC)),
    mapState((event, count: number) => {
      if (!isToolkitEvent(event)) return count;
      return event.id === INC ? count + 1 : count - 1;
    }, 0),
    textLabel("Count: %d", "Count: 0"),
  ),
);
