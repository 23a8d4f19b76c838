/**
 * What follows each castep_bin section header.
 *
 * Two registries are built once: the standard layout and the checkpoint
 * layout, which carries a wavefunction block between the band counts and the
 * eigenvalues. Entries are decoded in the order listed, so a shape can name
 * any scalar from an earlier entry.
 *
 * The cell is written twice, first as read from input ("_orig" fields) and
 * then as it stands at the end of the run (headers with the "_01" suffix).
 */

import type {
  ArrayField,
  BoolField,
  CompositeField,
  Dim,
  ElementType,
  FieldSpec,
  NumericType,
  ScalarField,
  SectionSpec,
  SkipField,
  SpecMap,
  StringField,
  StringType,
  StructuredField,
  StructuredProtocol,
  MemberField,
} from "./types.js";

export const scalar = (name: string, dtype: NumericType): ScalarField => ({
  kind: "scalar",
  name,
  dtype,
});

export const array = (name: string, dtype: ElementType, shape: readonly Dim[]): ArrayField => ({
  kind: "array",
  name,
  dtype,
  shape,
});

export const str = (name: string, dtype: StringType): StringField => ({
  kind: "string",
  name,
  dtype,
});

export const bool = (name: string): BoolField => ({ kind: "bool", name });

export const skip = (): SkipField => ({ kind: "skip" });

export const composite = (...fields: MemberField[]): CompositeField => ({
  kind: "composite",
  fields,
});

export const structured = (protocol: StructuredProtocol): StructuredField => ({
  kind: "structured",
  protocol,
});

/** Headers in this family are decoded even when filtered out */
export const CELL_PREFIX = "CELL%";

/** Also decoded under any filter: the density layout depends on its spin treatment */
export const ELECTRONIC_HEADER = "BEGIN_ELECTRONIC";

function section(header: string, ...fields: FieldSpec[]): SectionSpec {
  return Object.freeze({ header, fields: Object.freeze(fields) });
}

/** Name a field decoded under another name as well */
function aliased<T extends ScalarField | ArrayField>(field: T, alias: string): T {
  return { ...field, alias };
}

/**
 * The input cell is stored under "_orig" names and also under the plain
 * names, which the final cell's "_01" headers overwrite when present.
 */
function cellSections(input: boolean): SectionSpec[] {
  const suffix = input ? "" : "_01";
  const named = <T extends ScalarField | ArrayField>(field: T): T =>
    input ? aliased({ ...field, name: `${field.name}_orig` }, field.name) : field;
  const maxIons = input ? "max_ions_in_species_orig" : "max_ions_in_species";
  const species = input ? "num_species_orig" : "num_species";
  return [
    section(`CELL%NUM_IONS${suffix}`, named(scalar("num_ions", "i4"))),
    section(`CELL%MAX_IONS_IN_SPECIES${suffix}`, named(scalar("max_ions_in_species", "i4"))),
    section(`CELL%REAL_LATTICE${suffix}`, named(array("real_lattice", "f8", [3, 3]))),
    section(`CELL%RECIP_LATTICE${suffix}`, named(array("recip_lattice", "f8", [3, 3]))),
    section(`CELL%NUM_SPECIES${suffix}`, named(scalar("num_species", "i4"))),
    section(
      `CELL%NUM_IONS_IN_SPECIES${suffix}`,
      named(array("num_ions_in_species", "i4", [species]))
    ),
    section(
      `CELL%IONIC_POSITIONS${suffix}`,
      named(array("ionic_positions", "f8", [3, maxIons, species]))
    ),
    section(`CELL%SPECIES_SYMBOL${suffix}`, named(array("species_symbol", "a8", [species]))),
  ];
}

function buildSpecMap(checkpoint: boolean): SpecMap {
  const groundState: FieldSpec[] = [
    // Fortran LOGICALs stored as 4-byte integers
    bool("found_ground_state_wavefunction"),
    bool("found_ground_state_density"),
    scalar("total_energy", "f8"),
    scalar("fermi_energy", "f8"),
    composite(scalar("nbands", "i4"), scalar("nspins", "i4")),
    ...(checkpoint ? [structured("wavefunction")] : []),
    structured("eigenvalues-occupancies"),
    // Written a second time after the eigenvalues; kept positionally
    bool("found_ground_state_density"),
    composite(scalar("ngx_fine", "i4"), scalar("ngy_fine", "i4"), scalar("ngz_fine", "i4")),
    structured("charge-density"),
  ];

  return Object.freeze([
    section(
      ELECTRONIC_HEADER,
      skip(),
      skip(),
      skip(),
      skip(), // nspins
      skip(), // nbands, read again with the eigenvalues
      scalar("elec_temp", "f8"),
      skip(),
      skip(),
      skip(),
      str("electronic_minimizer", "a10"),
      scalar("nelectrons", "f8"),
      scalar("nup", "f8"),
      scalar("ndown", "f8"),
      scalar("spin", "f8"),
      scalar("charge", "f8"),
      str("spin_treatment", "a20")
    ),
    ...cellSections(true),
    ...cellSections(false),
    section("NKPTS_01", scalar("nkpts", "i4")),
    // k-points and weights in input order
    section("KPOINTS_01", array("kpoints", "f8", [3, "nkpts"])),
    section("KPOINT_WEIGHTS_01", array("kpoint_weights", "f8", ["nkpts"])),
    section("END_CELL_GLOBAL_01", ...groundState),
    section("E_FERMI", scalar("fermi_energy_second_spin", "f8")),
    section("FORCES", array("forces", "f8", [3, "max_ions_in_species", "num_species"])),
    section(
      "FORCE_CON",
      array("phonon_supercell_matrix", "i4", [3, 3]),
      array("phonon_force_constant_matrix", "f8", [3, "num_ions", 3, "num_ions", "num_cells"]),
      array("phonon_supercell_origins", "i4", [3, "num_cells"]),
      scalar("phonon_force_constant_row", "i4")
    ),
    section("BORN_CHGS", array("born_charges", "f8", [3, 3, "num_ions"])),
  ]);
}

export const STANDARD_SPEC_MAP: SpecMap = buildSpecMap(false);

export const CHECKPOINT_SPEC_MAP: SpecMap = buildSpecMap(true);

export function specMapFor(isCheckpoint: boolean): SpecMap {
  return isCheckpoint ? CHECKPOINT_SPEC_MAP : STANDARD_SPEC_MAP;
}
