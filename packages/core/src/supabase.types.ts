// Minimal Supabase Database types for this repo.
// If you prefer fully generated types, run:
//   npx supabase gen types typescript --project-id <ref> > packages/core/src/supabase.types.ts

export type Json =
  | string
  | number
  | boolean
  | null
  | { [key: string]: Json | undefined }
  | Json[];

export type Database = {
  duelhall: {
    Tables: {
      game_results: {
        Row: {
          result_id: string;
          session_id: string;
          game_kind: Database['duelhall']['Enums']['game_kind'];
          guild_id: string | null;
          channel_id: string;
          player1_id: string;
          player2_id: string;
          winner_id: string | null;
          scores: Json;
          end_reason: Database['duelhall']['Enums']['game_end_reason'];
          ended_at: string;
          created_at: string;
        };
        Insert: Partial<Database['duelhall']['Tables']['game_results']['Row']> & {
          session_id: string;
          game_kind: Database['duelhall']['Enums']['game_kind'];
          channel_id: string;
          player1_id: string;
          player2_id: string;
          end_reason: Database['duelhall']['Enums']['game_end_reason'];
        };
        Update: Partial<Database['duelhall']['Tables']['game_results']['Row']>;
        Relationships: [];
      };
      player_stats: {
        Row: {
          discord_user_id: string;
          guild_id: string;
          game_kind: Database['duelhall']['Enums']['game_kind'];
          display_name: string;
          wins: number;
          losses: number;
          updated_at: string;
        };
        Insert: Partial<Database['duelhall']['Tables']['player_stats']['Row']> & {
          discord_user_id: string;
          guild_id: string;
          game_kind: Database['duelhall']['Enums']['game_kind'];
        };
        Update: Partial<Database['duelhall']['Tables']['player_stats']['Row']>;
        Relationships: [];
      };
      error_logs: {
        Row: {
          error_id: string;
          discord_user_id: string;
          command_name: string;
          error_message: string;
          stack_trace: string;
          metadata: Json;
          created_at: string;
        };
        Insert: Partial<Database['duelhall']['Tables']['error_logs']['Row']> & {
          discord_user_id: string;
          command_name: string;
          error_message: string;
        };
        Update: Partial<Database['duelhall']['Tables']['error_logs']['Row']>;
        Relationships: [];
      };
    };
    Views: {
      global_player_stats: {
        Row: {
          discord_user_id: string;
          game_kind: Database['duelhall']['Enums']['game_kind'];
          display_name: string;
          wins: number;
          losses: number;
        };
        Relationships: [];
      };
    };
    Functions: {
      record_game_result: {
        Args: {
          p_session_id: string;
          p_game_kind: Database['duelhall']['Enums']['game_kind'];
          p_guild_id: string | null;
          p_channel_id: string;
          p_player1_id: string;
          p_player1_name: string;
          p_player2_id: string;
          p_player2_name: string;
          p_winner_id: string | null;
          p_scores: Json;
          p_end_reason: Database['duelhall']['Enums']['game_end_reason'];
          p_ended_at: string;
        };
        Returns: string;
      };
    };
    Enums: {
      game_kind: 'memory' | 'tictactoe' | 'rps' | 'rps_action';
      game_end_reason: 'completed' | 'agreed' | 'inactive';
    };
    CompositeTypes: Record<string, never>;
  };
  public: {
    Tables: Record<string, never>;
    Views: Record<string, never>;
    Functions: Record<string, never>;
    Enums: Record<string, never>;
    CompositeTypes: Record<string, never>;
  };
};
