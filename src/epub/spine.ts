import type { XmlElement } from "../xml/tree.ts";
import { SpineError } from "../utils/errors.ts";
import type { PageProgressionDirection, Spine, SpineItem } from "./types.ts";

function parseDirection(raw: string | undefined): PageProgressionDirection {
  if (raw === undefined) return "ltr";
  if (raw === "ltr" || raw === "rtl") return raw;
  return "unspecified";
}

export function extractSpine(element: XmlElement | undefined, source = element?.source ?? ""): Spine {
  if (!element) {
    throw new SpineError(source, "no spine element");
  }

  const refs = element.all("itemref");
  if (refs.length === 0) {
    throw new SpineError(source, "no itemref elements");
  }

  const items = refs.map((ref, index): SpineItem => {
    const idref = ref.attr("idref");
    if (!idref) {
      throw new SpineError(source, "missing idref attribute", `itemref #${index + 1}`);
    }

    const item: SpineItem = { idref, linear: (ref.attr("linear") ?? "yes") === "yes" };
    const id = ref.attr("id");
    if (id !== undefined) item.id = id;
    return item;
  });

  return {
    id: element.attr("id"),
    toc: element.attr("toc"),
    pageProgressionDirection: parseDirection(element.attr("page-progression-direction")),
    items,
  };
}
