import { scopedLogger } from "../logger";
import type { ControlChangeEvent } from "../midi/events";
import type { MidiSink } from "../midi/sink";
import { applyEnvelopeParams, createEnvelopeState, processSample } from "./envelope";
import type { EnvelopeFollowerState, EnvelopeParams } from "./envelope";

const log = scopedLogger("follower");

/** Valeurs publiées aux observateurs (UI, logs) après chaque bloc d'échantillons. */
export interface FollowerSnapshot {
  ccValue: number;
  currentAmplitude: number;
  isActive: boolean;
  isRunning: boolean;
}

export type FollowerListener = (snapshot: FollowerSnapshot) => void;

/**
 * Suiveur d'enveloppe: cycle de vie (arrêté → en marche inactif/actif) autour de
 * {@link processSample}, avec émission vers un {@link MidiSink} injecté.
 *
 * - `start()` ne fait rien tant que l'accès à l'entrée audio n'est pas accordé
 * - basculer actif/inactif n'interrompt pas l'intégration: le lissage continue, seule l'émission est coupée
 * - l'amplitude lissée survit à `stop()`/`start()` (pas de remise à zéro)
 */
export class EnvelopeFollower {
  private readonly state: EnvelopeFollowerState;
  private readonly listeners: Set<FollowerListener> = new Set();
  private running = false;
  private inputAccess = false;

  constructor(private sink: MidiSink | null = null, params: Partial<EnvelopeParams> = {}) {
    this.state = createEnvelopeState(params);
  }

  /** Remplace (ou retire) la capacité d'envoi MIDI. */
  setSink(sink: MidiSink | null): void {
    this.sink = sink;
  }

  /** Indique si la capture audio est autorisée (vérifiée par l'appelant). */
  setInputAccess(granted: boolean): void {
    this.inputAccess = granted;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get isActive(): boolean {
    return this.state.isActive;
  }

  get ccValue(): number {
    return this.state.ccValue;
  }

  get currentAmplitude(): number {
    return this.state.smoothedAmplitude;
  }

  /** Copie des paramètres courants (après bornage). */
  get params(): EnvelopeParams {
    const { threshold, gain, smoothing, ccNumber, midiChannel, clampInput } = this.state;
    return { threshold, gain, smoothing, ccNumber, midiChannel, clampInput };
  }

  /** Met à jour les paramètres (hot reload); valeurs bornées à leurs plages. */
  configure(params: Partial<EnvelopeParams>): void {
    applyEnvelopeParams(this.state, params);
  }

  /**
   * Démarre l'ingestion et active l'émission.
   * @returns false si l'accès à l'entrée n'est pas accordé (aucun changement d'état)
   */
  start(): boolean {
    if (!this.inputAccess) {
      log.debug("Démarrage ignoré: accès à l'entrée audio non accordé");
      return false;
    }
    this.running = true;
    this.state.isActive = true;
    log.info(`Suiveur démarré (CC ${this.state.ccNumber}, canal ${this.state.midiChannel})`);
    this.publish();
    return true;
  }

  /** Arrête l'ingestion; les échantillons suivants sont ignorés. */
  stop(): void {
    if (!this.running && !this.state.isActive) return;
    this.running = false;
    this.state.isActive = false;
    log.info("Suiveur arrêté");
    this.publish();
  }

  /** Arrêté: équivaut à `start()`. En marche: bascule l'émission sans interrompre l'ingestion. */
  toggleActive(): void {
    if (!this.running) {
      this.start();
      return;
    }
    this.state.isActive = !this.state.isActive;
    log.debug(`Émission ${this.state.isActive ? "activée" : "coupée"}`);
    this.publish();
  }

  /**
   * Ingère un échantillon. Ignoré si le suiveur est arrêté.
   * @returns l'évènement émis, ou null
   */
  ingest(amplitude: number): ControlChangeEvent | null {
    if (!this.running) return null;
    const evt = processSample(this.state, amplitude);
    if (evt) this.sink?.send(evt);
    return evt;
  }

  /**
   * Ingère un bloc d'échantillons (ex: buffer de 256) puis publie un instantané.
   * @returns nombre d'évènements émis
   */
  ingestBlock(samples: ArrayLike<number>): number {
    if (!this.running) return 0;
    let emitted = 0;
    for (let i = 0; i < samples.length; i += 1) {
      if (this.ingest(samples[i])) emitted += 1;
    }
    this.publish();
    return emitted;
  }

  snapshot(): FollowerSnapshot {
    return {
      ccValue: this.state.ccValue,
      currentAmplitude: this.state.smoothedAmplitude,
      isActive: this.state.isActive,
      isRunning: this.running,
    };
  }

  /**
   * Abonne un observateur aux instantanés publiés.
   * @returns Fonction pour se désabonner
   */
  subscribe(listener: FollowerListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private publish(): void {
    if (this.listeners.size === 0) return;
    const snap = this.snapshot();
    for (const fn of this.listeners) {
      try {
        fn(snap);
      } catch (err) {
        log.warn("Observateur en erreur:", err);
      }
    }
  }
}
