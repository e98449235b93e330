import { PortalFlags } from "./attributes";
import { FieldLayout } from "./fieldLayout";
import { REGISTER_SIZE_BITS, SvdOutPeripheral, SvdOutRegister } from "./svdDocument";

export interface RegisterInput {
  name: string;
  offset: number;
  resetValue: number;
  portals: PortalFlags;
}

const PORTAL_VARIANTS: ReadonlyArray<{ flag: keyof PortalFlags; suffix: string; offset: number }> = [
  { flag: "clr", suffix: "CLR", offset: 0x4 },
  { flag: "set", suffix: "SET", offset: 0x8 },
  { flag: "inv", suffix: "INV", offset: 0xc },
];

function makeRegister(name: string, offset: number, resetValue: number, layout: FieldLayout): SvdOutRegister {
  const register: SvdOutRegister = {
    name,
    description: `${name} register`,
    addressOffset: offset,
    size: REGISTER_SIZE_BITS,
    resetValue,
  };
  if (layout.bitCursor > 0) {
    register.fields = layout.fields.map((field) => ({ ...field }));
  }
  return register;
}

/**
 * Appends the register and its CLR/SET/INV aliases to `peripheral`.
 * Aliases are write-only, so their reset value is 0.
 */
export function synthesizeRegisters(
  peripheral: SvdOutPeripheral,
  input: RegisterInput,
  layout: FieldLayout
): SvdOutRegister[] {
  const emitted = [makeRegister(input.name, input.offset, input.resetValue, layout)];
  for (const variant of PORTAL_VARIANTS) {
    if (input.portals[variant.flag]) {
      emitted.push(makeRegister(`${input.name}${variant.suffix}`, input.offset + variant.offset, 0, layout));
    }
  }
  peripheral.registers.push(...emitted);
  return emitted;
}
