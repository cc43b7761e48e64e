import { z } from "zod";
import { GRAPH_IMAGE_HEIGHT, GRAPH_IMAGE_WIDTH } from "./features/log/graph/graph.config";

const Instant = z
    .string()
    .datetime({ offset: true })
    .transform((s) => Date.parse(s));

const OffsetSec = z.coerce.number().nonnegative();

export const CliOptionsSchema = z
    .object({
        filename: z.string().min(1).nullable(),
        out: z.string().min(1).default("graph.png"),
        width: z.coerce.number().int().positive().default(GRAPH_IMAGE_WIDTH),
        height: z.coerce.number().int().min(2).default(GRAPH_IMAGE_HEIGHT),

        // absolute window
        start: Instant.optional(),
        end: Instant.optional(),

        // scroller offsets (seconds after the first fix)
        from: OffsetSec.optional(),
        to: OffsetSec.optional(),
    })
    .refine(
        (o) => (o.start === undefined && o.end === undefined) || (o.from === undefined && o.to === undefined),
        { message: "Use either --start/--end or --from/--to, not both" }
    );

export type CliOptions = z.infer<typeof CliOptionsSchema>;
