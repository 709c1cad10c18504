import type { CPythonHandle, Type } from "@seam/core";
import { CPYTHON_HANDLES, cpythonType, systemsType } from "@seam/core";

function cpythonHandle(name: string): CPythonHandle | undefined {
  return CPYTHON_HANDLES.find((h) => h === name);
}

/**
 * Reads a clang `qualType` spelling such as `PyListObject *`, `const char *`
 * or `unsigned long`. CPython object handles are pointers; `Py_ssize_t` is a
 * plain integer handle. Unrecognised names are kept as typedef names.
 */
export function parseCType(text: string): Type {
  const t = text
    .replace(/\b(const|volatile|restrict)\b/g, " ")
    .replace(/\s+/g, " ")
    .replace(/\s+\*/g, "*")
    .trim();

  const array = /^(.*?)\s*\[(\d*)\]$/.exec(t);
  if (array) {
    const size = array[2] ?? "";
    return systemsType({
      kind: "array",
      element: parseCType(array[1] ?? ""),
      ...(size.length > 0 ? { size: Number(size) } : {}),
    });
  }

  if (t.endsWith("*")) {
    const base = t.slice(0, -1).trim();
    const handle = cpythonHandle(base);
    if (handle && handle !== "Py_ssize_t") return cpythonType(handle);
    return systemsType({ kind: "pointer", pointee: parseCType(base) });
  }

  if (t === "Py_ssize_t") return cpythonType("Py_ssize_t");
  if (t.startsWith("struct ")) return systemsType({ kind: "struct", name: t.slice("struct ".length) });
  if (t.startsWith("union ")) return systemsType({ kind: "union", name: t.slice("union ".length) });

  switch (t.replace(/^(unsigned|signed)\b ?/, "").replace(/ int$/, "")) {
    case "void":
      return systemsType({ kind: "void" });
    case "char":
      return systemsType({ kind: "char" });
    case "":
    case "int":
    case "short":
      return systemsType({ kind: "int" });
    case "long":
    case "long long":
      return systemsType({ kind: "long" });
    case "size_t":
      return systemsType({ kind: "size_t" });
    case "float":
      return systemsType({ kind: "float" });
    case "double":
      return systemsType({ kind: "double" });
    default:
      return systemsType({ kind: "typedef", name: t });
  }
}
